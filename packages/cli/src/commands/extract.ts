// Extract command - Generate cross-linked Markdown pages from rustdoc JSON
// Selection comes from the flags when --package is given, otherwise from cratedoc.json

import { Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import ora from 'ora';
import { DEFAULT_CONFIG_FILE, errorMessage } from '@cratedoc/core';
import { generateDocs } from '@cratedoc/docgen';
import { resolveExtractConfig } from '../utils/extract-config.js';

export default class Extract extends Command {
  static override description = 'Generate Markdown documentation from rustdoc JSON';

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --config ./docs/cratedoc.json --dry-run',
    '<%= config.bin %> <%= command.id %> --package demo --kind struct --module-path demo::shapes',
    '<%= config.bin %> <%= command.id %> --package demo --json target/doc/demo.json --output ./docs/api',
  ];

  static override flags = {
    config: Flags.string({
      char: 'c',
      description: 'Path to the configuration file',
      default: DEFAULT_CONFIG_FILE,
    }),
    output: Flags.string({
      char: 'o',
      description: 'Output directory (overrides outputPath)',
      required: false,
    }),
    package: Flags.string({
      char: 'p',
      description: 'Package to document, ignoring the configuration file',
      required: false,
    }),
    'module-path': Flags.string({
      char: 'm',
      description: 'Only document items below this module, e.g. demo::shapes',
      dependsOn: ['package'],
    }),
    kind: Flags.string({
      char: 'k',
      description: 'Kind of item to document',
      default: 'function',
    }),
    json: Flags.string({
      char: 'j',
      description: 'Prebuilt rustdoc JSON file, skips running cargo',
      dependsOn: ['package'],
    }),
    'manifest-path': Flags.string({
      description: 'Path to Cargo.toml',
      required: false,
    }),
    summary: Flags.boolean({
      description: 'Write a SUMMARY.md navigation file',
      allowNo: true,
    }),
    'dry-run': Flags.boolean({
      description: 'Render pages without writing them',
      default: false,
    }),
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(Extract);

    this.log('');
    this.log(chalk.green('⚡') + ' ' + chalk.bold.white('cratedoc') + ' : ' + chalk.gray('Extract Documentation'));
    this.log('');

    const spinner = ora('Loading configuration...').start();

    try {
      const config = await resolveExtractConfig(flags);
      spinner.succeed(
        chalk.green(`${config.packages.length} selection${config.packages.length !== 1 ? 's' : ''} configured`)
      );

      for (const pkg of config.packages) {
        const scope = pkg.modulePath ? ` in ${pkg.modulePath}` : '';
        this.log(chalk.gray(`  - ${pkg.kind} items of ${pkg.name}${scope}`));
      }
      this.log('');

      spinner.start('Generating documentation...');
      const pages = await generateDocs(config, {
        dryRun: flags['dry-run'],
        onProgress: (message) => {
          spinner.text = message;
        },
      });

      if (pages.length === 0) {
        spinner.warn(chalk.yellow('No items matched the selection'));
        return;
      }

      spinner.succeed(
        chalk.green(`${flags['dry-run'] ? 'Rendered' : 'Generated'} ${pages.length} page${pages.length !== 1 ? 's' : ''}`)
      );

      this.log('');
      this.log(chalk.gray('Output directory:'));
      this.log(chalk.cyan(`  ${config.outputPath}`));
      this.log('');
      this.log(chalk.gray(flags['dry-run'] ? 'Would write:' : 'Generated files:'));
      for (const page of pages) {
        this.log(chalk.white(`  - ${page.path}`));
      }
      this.log('');
    } catch (error) {
      spinner.fail(chalk.red('Extraction failed'));
      this.error(chalk.red(`Error: ${errorMessage(error)}`));
    }
  }
}
