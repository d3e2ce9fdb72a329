import { readFile } from 'fs/promises';
import { join } from 'path';
import { ZodError } from 'zod';
import { ConductorConfigSchema, CONFIG_FILENAME, type ConductorConfig } from './schema.js';
import { ConfigError } from '../errors/errors.js';
import { logger } from '../utils/logger.js';

export class ConfigLoader {
  private cachedConfig: ConductorConfig | null = null;

  constructor(private readonly configDir: string) {}

  get configPath(): string {
    return join(this.configDir, CONFIG_FILENAME);
  }

  /**
   * Load conductor.json. A missing file yields the defaults; a malformed one
   * is a ConfigError.
   */
  async load(): Promise<ConductorConfig> {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    let raw: string;
    try {
      raw = await readFile(this.configPath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        logger.debug('No config file, using defaults', { path: this.configPath });
        this.cachedConfig = ConductorConfigSchema.parse({});
        return this.cachedConfig;
      }
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new ConfigError(`Invalid JSON in config file: ${this.configPath}`);
    }

    try {
      this.cachedConfig = ConductorConfigSchema.parse(parsed);
    } catch (err) {
      if (err instanceof ZodError) {
        const details = err.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
        throw new ConfigError(`Invalid config file ${this.configPath}:\n${details.join('\n')}`);
      }
      throw err;
    }

    logger.info('Loaded conductor config', { path: this.configPath });
    return this.cachedConfig;
  }
}
