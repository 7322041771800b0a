export {
  DEFAULT_ENGINE_CONFIG,
  ENGINE_ENV_VARS,
  resolveEngineConfig,
  loadEngineConfigFromEnv,
} from './engine-config'
export type { EngineConfig } from './engine-config'
export { validateSourceDescriptor, loadSourceDescriptor } from './descriptor-validation'
export type { DescriptorValidationOptions, LoadedSource } from './descriptor-validation'
