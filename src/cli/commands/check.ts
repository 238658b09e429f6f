import { Command } from 'commander';
import { ConfigLoader } from '../../utils/config.js';
import { logger } from '../../utils/logger.js';
import { createPlatformProfile } from '../../provision/platform.js';
import { renderSummary } from '../../provision/report.js';
import { runProvisioning } from '../../provision/runner.js';
import { toConfigOverrides, type CommonCliOptions } from '../options.js';
import { createSpinnerReporter, exitWithError, printBanner } from '../ui.js';

export function createCheckCommand(): Command {
  const command = new Command('check');

  command
    .description('Report which tools and PowerShell modules are installed, without changing anything')
    .option('--tools <ids>', 'Comma-separated tool ids to check (default: all)')
    .option('--skip-modules', 'Do not check PowerShell modules')
    .option('--platform <name>', 'Force a platform profile (ubuntu, windows)')
    .option('--debug', 'Show every command that is run')
    .action(async (options: CommonCliOptions) => {
      try {
        const config = await ConfigLoader.load(process.cwd(), toConfigOverrides(options));
        logger.setDebug(config.debug || logger.isDebugEnabled());

        const profile = await createPlatformProfile(config, { requireRoot: false });
        printBanner(`${profile.displayName} Environment Check`);

        const summary = await runProvisioning(
          profile,
          {
            mode: 'verify',
            queryTimeoutMs: config.queryTimeoutMs,
            commandTimeoutMs: config.commandTimeoutMs,
            tools: config.tools,
            skipModules: config.skipModules,
            skipFeatures: true,
          },
          createSpinnerReporter('Checking')
        );

        console.log(renderSummary(summary));
        console.log();
        process.exitCode = summary.exitCode;
      } catch (error) {
        exitWithError(error);
      }
    });

  return command;
}
