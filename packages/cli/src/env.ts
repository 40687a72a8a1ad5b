import { createEnvSchema, loadEnvVariables } from '@zcl/core'
import { z } from 'zod'

export const cliEnvSchema = createEnvSchema({
  /** Header-record file used when `--headers` is not given */
  ZCL_HEADERS_FILE: z.string().min(1).optional(),
  /** Directory relative output paths are resolved against */
  ZCL_OUTPUT_DIR: z.string().min(1).default('.'),
})

export type CliEnv = z.infer<typeof cliEnvSchema>

export function loadCliEnv(envPath?: string): CliEnv {
  return loadEnvVariables(cliEnvSchema, envPath)
}
