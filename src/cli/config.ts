export interface CliConfig {
  errorHandler: (error: Error) => void
  logger: {
    info: (msg: string) => void
    warn: (msg: string) => void
    error: (msg: string) => void
    success: (msg: string) => void
  }
}

let config: CliConfig | undefined

export function configure(options: CliConfig) {
  config = options
}

export function getConfig(): CliConfig {
  if (!config) {
    throw new Error('CLI not configured')
  }
  return config
}

export const errors = {
  MISSING_FILE: 'No summary payload file specified',
  INVALID_PAYLOAD: 'Summary payload failed validation',
  UNSUPPORTED_FILE_TYPE: 'Summary payload must be a .json, .yml or .yaml file',
} as const
