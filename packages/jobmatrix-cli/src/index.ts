export type { CliOptions } from './cliOptions.js'
export { CliUsageError, getCliHelpText, parseCliOptions } from './cliOptions.js'

export type {
  CliConfigStep,
  CliModeScript,
  CliModeScripts,
  CliOutputFormat,
  JobMatrixCacheConfig,
  JobMatrixConfig,
  JobMatrixDeployConfig,
} from './config/types.js'
export type { LoadedJobMatrixConfig } from './config/loadConfig.js'
export { CONFIG_FILE_NAMES, loadJobMatrixConfig, parseJobMatrixConfig } from './config/loadConfig.js'
export type { MappedCache, MappedDeployCommand, MappedPipeline } from './config/mapConfigToPipeline.js'
export {
  DEFAULT_CACHE_STORE_DIR,
  DEFAULT_CACHE_WORK_DIR,
  mapConfigToPipeline,
} from './config/mapConfigToPipeline.js'

export type { CommandDeployActionOptions } from './deploy/commandDeployAction.js'
export { createCommandDeployAction, DEPLOY_ENV } from './deploy/commandDeployAction.js'

export type { PrettyReporterOptions } from './reporters/prettyReporter.js'
export { PrettyReporter } from './reporters/prettyReporter.js'

export { formatCliError, reportCliError } from './reportCliError.js'

export type { RunCliPipelineOptions } from './runPipeline.js'
export { CLI_ENV, runCliPipeline } from './runPipeline.js'
