import type { ConsoleAPI, LoggerConfig, LogLevel } from '@logging';

/**
 * Logging settings used when building the application logger
 */
export interface AppLoggingConfig extends LoggerConfig {
  consoleLevel: LogLevel;
  colors: boolean;
}

export interface InitOptions {
  /** Console the sink writes to and init errors are printed on */
  consoleApi?: ConsoleAPI;
  logging?: AppLoggingConfig;
}
