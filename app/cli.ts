import { Command } from 'commander';
import { kindsCommand } from './commands/kinds';
import { identityCommand } from './commands/identity';

const program = new Command();

program
  .name('taskmint')
  .description('taskmint CLI - inspect task kinds and cache identities')
  .version('0.1.0');

// Register commands
program.addCommand(kindsCommand);
program.addCommand(identityCommand);

export { program };
