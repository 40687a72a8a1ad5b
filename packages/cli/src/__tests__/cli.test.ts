import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { InvalidArgumentError } from 'commander'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'
import { executeArgs } from '../commands/args'
import { executeFormatArgs } from '../commands/format-args'
import { executeGenerate } from '../commands/generate'
import { cliEnvSchema } from '../env'
import { createProgram } from '../program'
import { loadHeaderSource, resolveOutputPath } from '../utils/files'
import {
  isValidPath,
  parseBlockNumber,
  parseFilePath,
} from '../utils/validation'

const HEADERS_FILE = fileURLToPath(
  new URL('./fixtures/headers.json', import.meta.url),
)

const env = cliEnvSchema.parse({})

describe('CLI options', () => {
  it('should register the commands', () => {
    const program = createProgram(env)
    expect(program.commands.map((command) => command.name())).toEqual([
      'generate',
      'format-args',
      'args',
    ])
  })

  it('should declare the generate options', () => {
    const generate = createProgram(env).commands.find(
      (command) => command.name() === 'generate',
    )
    expect(generate?.options.map((option) => option.long)).toEqual([
      '--height',
      '--num-blocks',
      '--headers',
      '--output',
    ])
  })

  it('should default the headers file from the environment', () => {
    const withHeaders = cliEnvSchema.parse({ ZCL_HEADERS_FILE: 'h.json' })
    const args = createProgram(withHeaders).commands.find(
      (command) => command.name() === 'args',
    )
    const headers = args?.options.find((option) => option.long === '--headers')
    expect(headers?.defaultValue).toBe('h.json')
  })

  it('should parse block numbers', () => {
    expect(parseBlockNumber('0')).toBe(0)
    expect(parseBlockNumber('1687104')).toBe(1687104)
    for (const value of ['-1', '1.5', 'abc', '', '99999999999999999999']) {
      expect(() => parseBlockNumber(value)).toThrow(InvalidArgumentError)
    }
  })

  it('should validate paths', () => {
    expect(isValidPath('out/chain.json')).toBe(true)
    expect(isValidPath('')).toBe(false)
    expect(isValidPath('bad|name')).toBe(false)
  })

  it('should reject unusable file paths as invalid arguments', () => {
    expect(parseFilePath('out/chain.json')).toBe('out/chain.json')
    for (const value of ['', 'bad|name', 'what?.json']) {
      expect(() => parseFilePath(value)).toThrow(InvalidArgumentError)
    }
  })

  it('should parse every file option as a path', () => {
    const fileOptions = createProgram(env).commands.flatMap((command) =>
      command.options.filter((option) =>
        ['--headers', '--output', '--input'].includes(option.long ?? ''),
      ),
    )
    expect(fileOptions).toHaveLength(5)
    for (const option of fileOptions) {
      expect(option.parseArg).toBe(parseFilePath)
    }
  })

  it('should resolve relative output paths against the output directory', () => {
    expect(resolveOutputPath('/data', 'out.json')).toBe('/data/out.json')
    expect(resolveOutputPath('/data', '/tmp/out.json')).toBe('/tmp/out.json')
  })

  it('should apply environment defaults', () => {
    expect(env.ZCL_OUTPUT_DIR).toBe('.')
    expect(env.ZCL_HEADERS_FILE).toBeUndefined()
    expect(env.LOG_LEVEL).toBe('info')
  })
})

describe('CLI commands', () => {
  let workDir = ''

  beforeAll(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'zcl-cli-'))
  })

  afterAll(async () => {
    await rm(workDir, { recursive: true, force: true })
  })

  it('should load the header fixture', async () => {
    const [error, source] = await loadHeaderSource(HEADERS_FILE)
    if (error) {
      throw error
    }
    expect(source.size).toBe(6)
  })

  it('should reject a header file that is not a list', async () => {
    const path = join(workDir, 'object.json')
    await writeFile(path, '{"height": 1}')
    const [error] = await loadHeaderSource(path)
    expect(error?.message).toBe(`Header file must hold a JSON array: ${path}`)
  })

  it('should report unreadable JSON', async () => {
    const path = join(workDir, 'broken.json')
    await writeFile(path, '[{')
    const [error] = await loadHeaderSource(path)
    expect(error?.message).toContain(`Invalid JSON in ${path}`)
  })

  it('should require a header file', async () => {
    const [error] = await executeGenerate(
      { height: 2, numBlocks: 2, output: 'out.json' },
      env,
    )
    expect(error?.message).toBe(
      'No header file: pass --headers or set ZCL_HEADERS_FILE',
    )
  })

  it('should generate chain data and format it like the typed path', async () => {
    const [error, path] = await executeGenerate(
      { height: 2, numBlocks: 2, headers: HEADERS_FILE, output: 'data.json' },
      { ...env, ZCL_OUTPUT_DIR: workDir },
    )
    if (error) {
      throw error
    }
    expect(path).toBe(join(workDir, 'data.json'))

    const written = JSON.parse(await readFile(path, 'utf-8'))
    expect(written.chain_state.block_height).toBe(2)
    expect(written.chain_state.total_work).toBe('3')
    expect(written.chain_state.prev_timestamps).toEqual([
      1600000000, 1600000150, 1600000300,
    ])
    expect(written.blocks).toHaveLength(2)
    expect(written.blocks[0].header.final_sapling_root).toBe('11'.repeat(32))
    expect(written.expected.block_height).toBe(4)

    const [formatError, formatted] = await executeFormatArgs(path)
    if (formatError) {
      throw formatError
    }
    const [argsError, args] = await executeArgs({
      height: 2,
      numBlocks: 2,
      headers: HEADERS_FILE,
    })
    if (argsError) {
      throw argsError
    }
    expect(args).toHaveLength(115)
    expect(args[0]).toBe('0x2')
    expect(formatted).toEqual(args)
  })

  it('should fail when the chain ends early', async () => {
    const [error] = await executeArgs({
      height: 4,
      numBlocks: 3,
      headers: HEADERS_FILE,
    })
    expect(error?.message).toBe('No next block hash for block 6')
  })
})
