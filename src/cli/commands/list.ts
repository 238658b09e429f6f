import { Command } from 'commander';
import chalk from 'chalk';
import { getFeatures, getTools, POWERSHELL_MODULES } from '../../provision/catalog.js';
import { detectPlatform } from '../../provision/platform.js';
import { parsePlatformOption } from '../options.js';
import { exitWithError } from '../ui.js';

export function createListCommand(): Command {
  const command = new Command('list');

  command
    .description('List the tools, OS features and PowerShell modules devprov manages')
    .option('--platform <name>', 'Show the catalog for another platform (ubuntu, windows)')
    .action((options: { platform?: string }) => {
      try {
        const platform = options.platform !== undefined
          ? parsePlatformOption(options.platform)
          : detectPlatform();

        console.log(chalk.bold(`\nTools (${platform}):`));
        for (const tool of getTools(platform)) {
          const manager = tool.packageManager ?? (platform === 'windows' ? 'winget' : 'apt');
          console.log(`  ${chalk.cyan(tool.id.padEnd(8))} ${tool.friendlyName} ${chalk.dim(`(${manager}: ${tool.candidateIds.join(', ')})`)}`);
        }

        console.log(chalk.bold('\nOS features:'));
        for (const feature of getFeatures(platform)) {
          console.log(`  ${chalk.dim('•')} ${feature.friendlyName}`);
        }

        console.log(chalk.bold('\nPowerShell modules:'));
        for (const name of POWERSHELL_MODULES) {
          console.log(`  ${chalk.dim('•')} ${name}`);
        }
        console.log();
      } catch (error) {
        exitWithError(error);
      }
    });

  return command;
}
