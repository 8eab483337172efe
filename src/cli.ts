import { Command } from 'commander';

import type { PlanOptions } from './commands/plan.js';
import { configureLogger } from './ui/logger.js';
import { getPackageInfo } from './utils/package-info.js';

const pkg = getPackageInfo();

export const program = new Command()
  .name('stackguard')
  .description(pkg.description)
  .version(pkg.version)
  .option('--debug', 'Log debug output, including unreadable or malformed manifests')
  .hook('preAction', (command) => {
    const { debug } = command.opts<{ debug?: boolean }>();
    configureLogger({ level: debug ? 'debug' : undefined });
  });

program
  .command('detect')
  .description('Detect the languages used in a project')
  .argument('[dir]', 'Project directory', '.')
  .action(async (dir: string) => {
    const { detectCommand } = await import('./commands/detect.js');
    await detectCommand(dir);
  });

program
  .command('tools')
  .description('Show which quality and security tools are configured, and what is missing')
  .argument('[dir]', 'Project directory', '.')
  .option('-l, --language <language>', 'Analyze only this language')
  .action(async (dir: string, options: { language?: string }) => {
    const { toolsCommand } = await import('./commands/tools.js');
    await toolsCommand(dir, options);
  });

program
  .command('deps')
  .description('List the dependencies declared in project manifests')
  .argument('[dir]', 'Project directory', '.')
  .option('-l, --language <language>', 'Read only this language')
  .action(async (dir: string, options: { language?: string }) => {
    const { depsCommand } = await import('./commands/deps.js');
    await depsCommand(dir, options);
  });

program
  .command('plan')
  .description('Preview (and optionally apply) tool configuration merged into project manifests')
  .argument('[dir]', 'Project directory', '.')
  .option('-t, --tools <tools>', 'Comma-separated tools to configure, e.g. ruff,bandit')
  .option('-w, --write', 'Write the planned changes')
  .option('-y, --yes', 'Do not ask for confirmation before writing')
  .option('-b, --backup-dir <dir>', 'Copy each file to this directory before updating it')
  .action(async (dir: string, options: PlanOptions) => {
    const { planCommand } = await import('./commands/plan.js');
    await planCommand(dir, options);
  });
