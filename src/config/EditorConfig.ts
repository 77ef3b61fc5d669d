// src/config/EditorConfig.ts
import { isLogLevel } from '../log/Logger';
import type { LogLevel } from '../log/Logger';

export interface EditorConfig {
  /**
   * Modo estrito: assinatura/checksum inválidos no load viram FormatError e a
   * leitura de campos rejeita bytes inválidos. Fora dele só há warnings.
   */
  strict: boolean;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: Readonly<EditorConfig> = {
  strict: false,
  logLevel: 'info',
};

export const ENV_STRICT = 'FZERO_SRAM_STRICT';
export const ENV_LOG_LEVEL = 'FZERO_SRAM_LOG_LEVEL';

/** Lê overrides do ambiente; valores desconhecidos são ignorados. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: Partial<EditorConfig> = {}): EditorConfig {
  const config: EditorConfig = { ...DEFAULT_CONFIG };

  const strict = env[ENV_STRICT]?.trim().toLowerCase();
  if (strict !== undefined && strict !== '') {
    config.strict = strict === '1' || strict === 'true' || strict === 'yes';
  }

  const level = env[ENV_LOG_LEVEL]?.trim().toLowerCase();
  if (level && isLogLevel(level)) {
    config.logLevel = level;
  }

  return { ...config, ...overrides };
}
