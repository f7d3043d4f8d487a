// Config module exports

export { ConfigCore, type ConfigInitOptions, type ConfigSource } from './config-core.ts';
export { QuireConfig } from './config.ts';
export { schema, type ConfigProperty, type ConfigSchema } from './schema.ts';
export {
  parseCliFlags,
  generateConfigHelp,
  generateFlagHelp,
  generateEnvVarHelp,
  type ParsedCliFlags,
} from './cli.ts';
