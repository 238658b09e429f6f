import { Command } from 'commander';
import inquirer from 'inquirer';
import { ConfigLoader } from '../../utils/config.js';
import { logger } from '../../utils/logger.js';
import { filterTools } from '../../provision/catalog.js';
import { createPlatformProfile } from '../../provision/platform.js';
import { renderSummary } from '../../provision/report.js';
import { runProvisioning } from '../../provision/runner.js';
import { toConfigOverrides, type SetupCliOptions } from '../options.js';
import { createSpinnerReporter, exitWithError, printBanner } from '../ui.js';

export function createSetupCommand(): Command {
  const command = new Command('setup');

  command
    .description('Install missing developer tools, OS features and PowerShell modules')
    .option('--tools <ids>', 'Comma-separated tool ids to provision (default: all)')
    .option('--skip-modules', 'Do not install PowerShell modules')
    .option('--skip-features', 'Do not enable OS features (WSL, containers, docker group)')
    .option('--no-upgrade', 'Skip the full system upgrade (Ubuntu)')
    .option('--platform <name>', 'Force a platform profile (ubuntu, windows)')
    .option('-y, --yes', 'Do not ask for confirmation')
    .option('--debug', 'Show every command that is run')
    .action(async (options: SetupCliOptions) => {
      try {
        const config = await ConfigLoader.load(process.cwd(), toConfigOverrides(options));
        logger.setDebug(config.debug || logger.isDebugEnabled());

        const profile = await createPlatformProfile(config, { requireRoot: true });
        const tools = filterTools(profile.tools, config.tools);

        printBanner(`${profile.displayName} Developer Setup`);
        console.log(`Tools: ${tools.map(t => t.friendlyName).join(', ')}`);
        if (!config.skipModules) {
          console.log(`PowerShell modules: ${profile.modules.map(m => m.name).join(', ')}`);
        }

        if (!options.yes && process.stdin.isTTY) {
          const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
            {
              type: 'confirm',
              name: 'proceed',
              message: 'Install anything that is missing?',
              default: true,
            },
          ]);
          if (!proceed) {
            logger.info('Aborted.');
            return;
          }
        } else if (!options.yes) {
          logger.warn('No terminal attached; continuing without confirmation.');
        }

        const summary = await runProvisioning(
          profile,
          {
            mode: 'install',
            queryTimeoutMs: config.queryTimeoutMs,
            commandTimeoutMs: config.commandTimeoutMs,
            tools: config.tools,
            skipModules: config.skipModules,
            skipFeatures: config.skipFeatures,
          },
          createSpinnerReporter('Installing')
        );

        console.log(renderSummary(summary));
        console.log();
        if (summary.exitCode === 0 && !summary.rebootNeeded) {
          logger.success(`${profile.displayName} developer environment is ready.`);
        }
        process.exitCode = summary.exitCode;
      } catch (error) {
        exitWithError(error);
      }
    });

  return command;
}
