import { promises as fs } from 'fs';

import { ConfigurationError } from '@backstop/errors';
import type { Logger } from '@backstop/logging';
import { load as yamlLoad } from 'js-yaml';
import { z } from 'zod';

import { ConfigUtils } from './utils.js';

/**
 * Options for configuration management
 */
export interface ConfigOptions {
  /** Logger instance for configuration operations */
  logger?: Logger;
  /** Whether to substitute ${VAR} and ${VAR:-default} placeholders */
  enableEnvSubstitution?: boolean;
  /** Default configuration to merge under the loaded config */
  defaults?: Record<string, unknown>;
}

/**
 * Configuration validation error with detailed information
 */
export class ConfigValidationError extends ConfigurationError {
  constructor(
    message: string,
    public readonly errors: z.ZodError
  ) {
    super(message, { code: 'CONFIG_VALIDATION_ERROR', issues: formatIssues(errors) });
  }

  /**
   * Get formatted error details
   */
  getFormattedErrors(): string[] {
    return [...this.issues];
  }
}

function formatIssues(errors: z.ZodError): string[] {
  return errors.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Configuration manager for YAML files validated by a Zod schema
 */
export class ConfigManager<T> {
  private config: T | null = null;
  private readonly logger: Logger | undefined;

  constructor(
    private readonly configPath: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly options: ConfigOptions = {}
  ) {
    this.logger = options.logger;
  }

  /**
   * Load configuration from file
   */
  async loadConfig(): Promise<T> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf8');
    } catch (error) {
      this.logger?.error(`Failed to read configuration: ${this.configPath}`, error);
      throw new ConfigurationError(`Configuration file not readable: ${this.configPath}`, {
        cause: error,
      });
    }

    let parsed: unknown;
    try {
      parsed = yamlLoad(content);
    } catch (error) {
      this.logger?.error(`Failed to parse configuration: ${this.configPath}`, error);
      throw new ConfigurationError(`Configuration file is not valid YAML: ${this.configPath}`, {
        cause: error,
      });
    }

    try {
      this.config = this.validateAndTransform(parsed ?? {});
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        this.logger?.error(`Configuration validation failed: ${this.configPath}`, undefined, {
          issues: error.getFormattedErrors(),
        });
      }
      throw error;
    }

    this.logger?.info(`Configuration loaded from: ${this.configPath}`);
    return this.config;
  }

  /**
   * Apply env substitution and defaults, then validate
   */
  validateAndTransform(config: unknown): T {
    let processed = config;

    if (this.options.enableEnvSubstitution) {
      try {
        processed = ConfigUtils.processEnvVars(processed);
      } catch (error) {
        throw new ConfigurationError(`Environment substitution failed for ${this.configPath}`, {
          cause: error,
        });
      }
    }

    if (this.options.defaults && ConfigUtils.isPlainObject(processed)) {
      processed = ConfigUtils.mergeConfigs(this.options.defaults, processed);
    }

    return this.validateConfig(processed);
  }

  /**
   * Validate configuration without loading from file
   */
  validateConfig(config: unknown): T {
    const result = this.schema.safeParse(config);

    if (!result.success) {
      throw new ConfigValidationError(
        `Configuration validation failed for ${this.configPath}`,
        result.error
      );
    }

    return result.data;
  }

  /**
   * Get current configuration (must be loaded first)
   */
  getConfig(): T {
    if (this.config === null) {
      throw new ConfigurationError('Configuration not loaded. Call loadConfig() first.');
    }
    return this.config;
  }

  isLoaded(): boolean {
    return this.config !== null;
  }

  async configExists(): Promise<boolean> {
    try {
      await fs.access(this.configPath);
      return true;
    } catch {
      return false;
    }
  }

  getConfigPath(): string {
    return this.configPath;
  }
}

/**
 * Utility function to create a configuration manager
 */
export function createConfigManager<T>(
  configPath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options?: ConfigOptions
): ConfigManager<T> {
  return new ConfigManager(configPath, schema, options);
}

// Re-export Zod for schema creation
export { z } from 'zod';

export { ConfigUtils, TIME_UNITS, type TimeUnit } from './utils.js';
export * from './schemas.js';
