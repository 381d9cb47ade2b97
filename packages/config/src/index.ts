export {
  geometrySchema,
  batchConfigSchema,
  sessionConfigSchema,
  parseBatchConfig,
  parseSessionConfig,
  configVolumeLitres,
  configReportOptions,
  REFERENCE_POT,
  type BatchConfig,
  type BatchConfigInput,
  type SessionConfig,
  type SessionConfigInput,
  type ConfigParseResult,
} from './session'

export { readEnvOverrides, ENV_KEYS } from './env'
