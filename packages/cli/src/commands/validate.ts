import { Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import { ConfigManager, DEFAULT_CONFIG_FILE } from '@cratedoc/core';
import { isSelectableKind } from '@cratedoc/docgen';

/**
 * Command to check a configuration file without extracting anything
 *
 * @example
 * ```bash
 * cratedoc validate
 * cratedoc validate --config ./docs/cratedoc.json
 * ```
 */
export default class Validate extends Command {
  static override description = 'Validate the cratedoc configuration file';

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --config ./docs/cratedoc.json',
  ];

  static override flags = {
    config: Flags.string({
      char: 'c',
      description: 'Path to the configuration file',
      default: DEFAULT_CONFIG_FILE,
    }),
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(Validate);
    const manager = new ConfigManager(flags.config);

    if (!(await manager.exists())) {
      this.error(chalk.red(`Configuration file not found: ${manager.configPath}`));
    }

    const result = await manager.validate(isSelectableKind);

    if (result.valid) {
      this.log(chalk.green('✓') + ' ' + chalk.gray(manager.configPath) + ' is valid');
      return;
    }

    this.log(chalk.red('✗') + ' ' + chalk.gray(manager.configPath));
    for (const error of result.errors) {
      this.log(chalk.red(`  - ${error}`));
    }
    this.error(`${result.errors.length} problem${result.errors.length !== 1 ? 's' : ''} found`, { exit: 1 });
  }
}
