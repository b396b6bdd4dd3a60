import chalk from 'chalk';
import {
  loadConfig,
  saveConfig,
  getConfigPath,
  isValidConfigKey,
  isValidConfigValue,
  isNumericConfigKey,
  withConfigValue,
} from '../../utils/config';
import { DEFAULT_CONFIG, VALID_CONFIG_KEYS, ConfigKey } from '../../types/config';

/**
 * focus config command implementation
 * Manages user configuration
 */
export function configCommand(subcommand?: string, args?: string[]): void {
  try {
    // No subcommand: show current config
    if (!subcommand) {
      showConfig();
      return;
    }

    switch (subcommand) {
      case 'get':
        if (!args || args.length === 0) {
          console.error(chalk.red('Error: Missing config key'));
          console.error('Usage: focus config get <key>');
          process.exit(1);
          return;
        }
        getConfigValue(args[0]);
        break;

      case 'set':
        if (!args || args.length < 2) {
          console.error(chalk.red('Error: Missing config key or value'));
          console.error('Usage: focus config set <key> <value>');
          process.exit(1);
          return;
        }
        setConfigValue(args[0], args[1]);
        break;

      case 'path':
        console.log(getConfigPath());
        break;

      default:
        console.error(chalk.red(`Error: Unknown subcommand '${subcommand}'`));
        console.error('Available subcommands: get, set, path');
        process.exit(1);
    }
  } catch (error) {
    console.error(chalk.red(`Error: ${error}`));
    process.exit(1);
  }
}

function showConfig(): void {
  const config = loadConfig();

  console.log(chalk.bold('\nCurrent Configuration:\n'));
  console.log(`${chalk.gray('Config file:')} ${getConfigPath()}\n`);

  for (const key of VALID_CONFIG_KEYS) {
    const marker = config[key] === DEFAULT_CONFIG[key] ? chalk.gray(' (default)') : '';
    console.log(`${chalk.cyan(`${key}:`.padEnd(30))}${config[key]}${marker}`);
  }

  console.log(chalk.gray('\nCommands:'));
  console.log(chalk.gray('  focus config get <key>         Get a config value'));
  console.log(chalk.gray('  focus config set <key> <value> Set a config value'));
  console.log(chalk.gray('  focus config path              Show config file path'));
}

function invalidKey(key: string): void {
  console.error(chalk.red(`Error: Invalid config key '${key}'`));
  console.error(chalk.gray(`Valid keys: ${VALID_CONFIG_KEYS.join(', ')}`));
  process.exit(1);
}

function getConfigValue(key: string): void {
  if (!isValidConfigKey(key)) {
    invalidKey(key);
    return;
  }

  console.log(String(loadConfig()[key]));
}

function setConfigValue(key: string, value: string): void {
  if (!isValidConfigKey(key)) {
    invalidKey(key);
    return;
  }

  if (!isValidConfigValue(key, value)) {
    console.error(chalk.red(`Error: Invalid value '${value}' for ${key}`));
    console.error(chalk.gray(getValidValuesHint(key)));
    process.exit(1);
    return;
  }

  saveConfig(withConfigValue(loadConfig(), key, value));

  console.log(chalk.green(`✓ Set ${chalk.cyan(key)} = ${chalk.bold(value)}`));
}

function getValidValuesHint(key: ConfigKey): string {
  if (isNumericConfigKey(key)) {
    return 'Valid values: a positive whole number';
  }
  return 'Valid values: terminal, json';
}
