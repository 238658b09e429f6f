#!/usr/bin/env node

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { join } from 'path';
import { createSetupCommand } from './commands/setup.js';
import { createCheckCommand } from './commands/check.js';
import { createListCommand } from './commands/list.js';
import { getDirname } from '../utils/dirname.js';

const program = new Command();

// Read version from package.json
let version = '0.0.0';
try {
  const packageJsonPath = join(getDirname(import.meta.url), '../../package.json');
  const packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8')) as { version: string };
  version = packageJson.version;
} catch {
  // Use default version if unable to read
}

program
  .name('devprov')
  .description('Check for and install a developer toolchain and PowerShell modules on Ubuntu and Windows')
  .version(version);

program.addCommand(createSetupCommand());
program.addCommand(createCheckCommand());
program.addCommand(createListCommand());

await program.parseAsync(process.argv);
