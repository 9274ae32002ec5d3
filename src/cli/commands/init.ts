/**
 * CLI command that writes a default configuration.
 */
import { Command } from 'commander';
import { join } from 'node:path';
import { getConfigPath, getDefaultConfig, configExists } from '../../core/config/loader.js';
import { ConfigError, ErrorCodes, getErrorMessage } from '../../utils/errors.js';
import { fileExists, writeFile } from '../../utils/file-system.js';
import { stringifyYaml } from '../../utils/yaml.js';
import { DEFAULT_IGNORE_PATTERNS, IGNORE_FILENAME } from '../../utils/ignore-file.js';
import { logger } from '../../utils/logger.js';

export interface InitOptions {
  force?: boolean;
}

const CONFIG_HEADER = '# pathorder configuration\n';

const IGNORE_HEADER = '# Files pathorder never checks (gitignore syntax)\n';

/**
 * Create the init command.
 */
export function createInitCommand(): Command {
  return new Command('init')
    .description('Write .pathorder/config.yaml and .pathorderignore with defaults')
    .option('--force', 'Overwrite existing files')
    .action(async (options: InitOptions) => {
      try {
        const written = await runInit(process.cwd(), options);
        for (const file of written) {
          logger.success(`Created ${file}`);
        }
      } catch (error) {
        logger.error(getErrorMessage(error));
        process.exit(1);
      }
    });
}

/**
 * Write the default files. Returns the paths written.
 */
export async function runInit(projectRoot: string, options: InitOptions = {}): Promise<string[]> {
  if (!options.force && await configExists(projectRoot)) {
    throw new ConfigError(
      ErrorCodes.CONFIG_EXISTS,
      `${getConfigPath(projectRoot)} already exists. Use --force to overwrite.`
    );
  }

  const written: string[] = [];

  const configPath = getConfigPath(projectRoot);
  await writeFile(configPath, CONFIG_HEADER + stringifyYaml(getDefaultConfig()));
  written.push(configPath);

  const ignorePath = join(projectRoot, IGNORE_FILENAME);
  if (options.force || !(await fileExists(ignorePath))) {
    await writeFile(ignorePath, IGNORE_HEADER + DEFAULT_IGNORE_PATTERNS.join('\n') + '\n');
    written.push(ignorePath);
  }

  return written;
}
