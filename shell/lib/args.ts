export interface CliArgs {
  config?: string
  mode?: string
  cmd?: string
  database?: string
}

export const USAGE = 'Usage: litesh [--config <path>] [--mode <mode>] [--cmd <sql>] <database>'

// Parse command line arguments
export function parseArgs(argv: string[]): CliArgs {
  const result: CliArgs = {}
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--config' && argv[i + 1]) {
      result.config = argv[++i]
    } else if (argv[i] === '--mode' && argv[i + 1]) {
      result.mode = argv[++i]
    } else if (argv[i] === '--cmd' && argv[i + 1]) {
      result.cmd = argv[++i]
    } else if (!argv[i].startsWith('--') && result.database === undefined) {
      result.database = argv[i]
    }
  }
  return result
}
