import { z } from 'zod'

const BooleanFlagSchema = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => ['1', '0', 'true', 'false', 'yes', 'no', 'on', 'off', ''].includes(value), {
    message: 'Expected one of 1/0, true/false, yes/no, on/off'
  })
  .transform((value) => ['1', 'true', 'yes', 'on'].includes(value))

export const EnvSchema = z.object({
  PASSWORD_MANAGER_KEY: z.string().optional(),
  PASSWORD_MANAGER_FILE: z.string().trim().min(1).default('passwords.txt'),
  PASSWORD_MANAGER_DEBUG: BooleanFlagSchema.default('false'),
  PASSWORD_MANAGER_LOG_DIR: z.string().trim().min(1).optional()
})

export type Env = z.infer<typeof EnvSchema>

export interface AppConfig {
  /** Operator passphrase; `undefined` when the variable is not set at all. */
  passphrase: string | undefined
  /** Absolute path of the backing credentials file. */
  dataFile: string
  /** Whether to flush the log ring to disk on exit. */
  debug: boolean
  /** Directory log flushes are written to. */
  logDir: string
}
