export * from './errors';
export * from './adapters';
export * from './engine';
export * from './imaging';
export * from './monitoring';
export { getEnv, loadEnvFile, requireCredentials, resetEnv } from './config/env';
export type { Credentials, Env } from './config/env';
export {
  REQUIRED_SELECTORS,
  UploadConfigSchema,
  loadUploadConfig,
  parseUploadConfig,
  selectorFor,
  selectorKind,
} from './config/uploadConfig';
export type { SelectorKind, UploadConfig, UploadConfigInput } from './config/uploadConfig';
export { formatInspection, formatRotationResult, formatSummaryTable } from './report/summaryTable';
