import { Args } from '@oclif/core';
import chalk from 'chalk';
import { PhpSwitchCommand } from '../cli/PhpSwitchCommand';
import { CONFIG_KEYS, ConfigManager } from '../core/ConfigManager';
import { PhpSwitchConfig } from '../types/Config';
import { ValidationError } from '../utils/errors';

export default class Config extends PhpSwitchCommand {
  static override description = 'Show or change phpswitch settings';

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> maxBackups',
    '<%= config.bin %> <%= command.id %> autoRestart false',
  ];

  static override args = {
    key: Args.string({ description: 'Setting to show or change' }),
    value: Args.string({ description: 'New value; an empty string restores the default' }),
  };

  public async run(): Promise<void> {
    const { args } = await this.parse(Config);

    try {
      const manager = ConfigManager.getInstance();

      if (args.key === undefined) {
        this.printAll(await manager.load(), manager.configPath);
        return;
      }

      if (!ConfigManager.isConfigKey(args.key)) {
        throw new ValidationError(
          `Unknown config key '${args.key}'`,
          'invalid-value',
          `Known keys: ${CONFIG_KEYS.join(', ')}`
        );
      }

      if (args.value === undefined) {
        const value = (await manager.load())[args.key];
        this.log(value === undefined ? '' : String(value));
        return;
      }

      const updated = await manager.set(args.key, args.value);
      this.status('success', `${args.key} = ${String(updated[args.key] ?? '(default)')}`);
    } catch (error) {
      this.fail('Failed to update config', error);
    }
  }

  private printAll(config: PhpSwitchConfig, configPath: string): void {
    this.log(chalk.blue(`📋 Settings (${configPath}):\n`));
    for (const key of CONFIG_KEYS) {
      const value = config[key];
      this.log(`  ${chalk.white(key.padEnd(22))} ${value === undefined ? chalk.gray('(not set)') : chalk.green(String(value))}`);
    }
  }
}
