// Typed configuration for quire
// Schema-driven with layered overrides: defaults < file < env < cli

import { isLogLevel, type LogFormat, type LogLevel } from '../logging.ts';
import { ConfigCore, type ConfigInitOptions } from './config-core.ts';

// Module-level singleton
let _instance: QuireConfig | null = null;

function isLogFormat(value: string): value is LogFormat {
  return value === 'json' || value === 'text' || value === 'structured';
}

export class QuireConfig extends ConfigCore {
  /**
   * Initialize config (call once at startup)
   */
  static init(options: ConfigInitOptions = {}): QuireConfig {
    if (_instance) {
      throw new Error('QuireConfig already initialized. Call reset() first if re-initialization is needed.');
    }
    const fileConfig = options.fileConfig ?? ConfigCore.loadConfigFile(options.configFile);
    _instance = new QuireConfig(fileConfig, options.cliFlags ?? {});
    return _instance;
  }

  /**
   * Get initialized config (auto-inits with defaults if not initialized)
   */
  static get(): QuireConfig {
    return _instance ?? this.init();
  }

  static isInitialized(): boolean {
    return _instance !== null;
  }

  /**
   * Reset singleton (for testing)
   */
  static reset(): void {
    _instance = null;
  }

  // Logging
  get logLevel(): LogLevel {
    const level = this.getString('log.level', 'INFO').toUpperCase();
    return isLogLevel(level) ? level : 'INFO';
  }

  get logFile(): string {
    return this.getString('log.file', '');
  }

  get logFormat(): LogFormat {
    const format = this.getString('log.format', 'structured');
    return isLogFormat(format) ? format : 'structured';
  }

  // Rendering
  get renderIndent(): number {
    return Math.max(0, Math.trunc(this.getNumber('render.indent', 4)));
  }

  get renderColor(): boolean {
    return this.getBoolean('render.color', true);
  }

  // Parser
  get parserLogDiagnostics(): boolean {
    return this.getBoolean('parser.logDiagnostics', false);
  }
}
