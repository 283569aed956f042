import { Command, Option } from 'commander';

import { getPackageInfo } from './utils/package-info.js';
import { FILE_PATTERNS } from './core/file-selector.js';
import { REPORT_FORMATS } from './report/index.js';
import type { AddOptions } from './commands/add.js';
import type { OptionsCommandOptions } from './commands/options.js';
import { CSV_MODES, SUMMARY_MODES } from './commands/services.js';
import type { ServicesOptions } from './commands/services.js';
import type { TagsOptions } from './commands/tags.js';

const pkg = getPackageInfo();

const patternOption = (defaultPattern: string): Option =>
  new Option('--pattern <pattern>', `Which files to scan (default: ${defaultPattern})`).choices(FILE_PATTERNS);

const formatOption = (): Option =>
  new Option('-f, --format <format>', 'Format of the --output file').choices(REPORT_FORMATS).default('txt');

export const program = new Command()
  .name('stackscan')
  .description(pkg.description)
  .version(pkg.version);

program
  .command('tags')
  .description('List tag values of services in prodN.yml files, custom deploy tags by default')
  .argument('<path>', 'Directory with the files to scan')
  .option('--all', 'Include version, hash and generic tags')
  .option('-s, --service <filter>', 'Only services whose name contains this text')
  .option('-b, --brief', 'Leave out line numbers')
  .option('--grouped', 'Print one block per file')
  .option('-q, --quiet', 'Do not print the report (only write --output)')
  .option('-o, --output <file>', 'Write the report to a file')
  .option('--config <file>', 'Settings file (default: <path>/.stackscan.yml)')
  .addOption(patternOption('prod'))
  .addOption(formatOption())
  .action(async (path: string, options: TagsOptions) => {
    const { tagsCommand } = await import('./commands/tags.js');
    await tagsCommand(path, options);
  });

program
  .command('options')
  .description('List option tokens (jvm_run_opts by default) of services in YAML files')
  .argument('<path>', 'Directory with the files to scan')
  .option('-s, --service <filter>', 'Only services whose name contains this text')
  .option('--field <key>', 'Option list field to read')
  .option('--list-services', 'Only list the services found per file')
  .option('-q, --quiet', 'Do not print the report (only write --output)')
  .option('-o, --output <file>', 'Write the report to a file')
  .option('--config <file>', 'Settings file (default: <path>/.stackscan.yml)')
  .addOption(patternOption('yaml'))
  .addOption(formatOption())
  .action(async (path: string, options: OptionsCommandOptions) => {
    const { optionsCommand } = await import('./commands/options.js');
    await optionsCommand(path, options);
  });

program
  .command('services')
  .description('Show which files define which services')
  .argument('<path>', 'Directory with the files to scan')
  .option('-s, --service <filter>', 'Files that define services whose name contains this text')
  .option('--file <label>', 'Services defined in one file (name without extension)')
  .addOption(new Option('--summary <mode>', 'Counts per service or per file').choices(SUMMARY_MODES))
  .option('-o, --output <file>', 'Write a CSV export')
  .addOption(new Option('--csv-mode <mode>', 'Rows of the CSV export').choices(CSV_MODES))
  .option('--config <file>', 'Settings file (default: <path>/.stackscan.yml)')
  .addOption(patternOption('yaml'))
  .action(async (path: string, options: ServicesOptions) => {
    const { servicesCommand } = await import('./commands/services.js');
    await servicesCommand(path, options);
  });

program
  .command('add')
  .description('Add a value to a comma-separated field (active_profiles by default) of matching services')
  .argument('<path>', 'Directory with the files to edit')
  .argument('<value>', 'Value to add')
  .requiredOption('-s, --service <filter>', 'Services whose name contains this text')
  .option('--field <key>', 'Field to add the value to')
  .option('--dry-run', 'Show the edits without writing files')
  .option('-y, --yes', 'Do not ask for confirmation')
  .option('--config <file>', 'Settings file (default: <path>/.stackscan.yml)')
  .addOption(patternOption('yaml'))
  .action(async (path: string, value: string, options: AddOptions) => {
    const { addCommand } = await import('./commands/add.js');
    await addCommand(path, value, options);
  });
