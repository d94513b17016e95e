import { readFile } from 'fs/promises';
import { join } from 'path';
import { ZodError } from 'zod';
import { OrchestratorConfigSchema, OrchestratorConfig, DEFAULT_STATE_DIR } from './schema.js';
import { ConfigError } from '../errors.js';
import { logger } from '../utils/logger.js';

export const CONFIG_FILE_NAME = 'config.json';

export class ConfigLoader {
  private stateDir: string;
  private cachedConfig: OrchestratorConfig | null = null;

  constructor(stateDir: string = process.env.MICROVM_STATE_DIR || DEFAULT_STATE_DIR) {
    this.stateDir = stateDir;
  }

  /**
   * Load `<stateDir>/config.json`. A missing file yields the defaults; a file
   * that is not JSON or does not match the schema is rejected.
   */
  async load(overrides: Record<string, unknown> = {}): Promise<OrchestratorConfig> {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const configPath = this.getConfigPath();
    let fileValues: Record<string, unknown> = {};

    try {
      const raw = await readFile(configPath, 'utf-8');
      const parsed: unknown = JSON.parse(raw);
      if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new ConfigError(`Config file must contain a JSON object: ${configPath}`);
      }
      fileValues = { ...parsed };
      logger.info('Loaded orchestrator config', { path: configPath });
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        logger.debug('No config file, using defaults', { path: configPath });
      } else if (err instanceof SyntaxError) {
        throw new ConfigError(`Invalid JSON in config file: ${configPath}`);
      } else {
        throw err;
      }
    }

    try {
      this.cachedConfig = OrchestratorConfigSchema.parse({
        stateDir: this.stateDir,
        ...fileValues,
        ...overrides,
      });
    } catch (err) {
      if (err instanceof ZodError) {
        const issues = err.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new ConfigError(`Invalid config in ${configPath}: ${issues.join('; ')}`);
      }
      throw err;
    }

    return this.cachedConfig;
  }

  getConfigPath(): string {
    return join(this.stateDir, CONFIG_FILE_NAME);
  }

  getStateDir(): string {
    return this.stateDir;
  }
}
