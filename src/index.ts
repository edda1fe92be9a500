import { Command } from 'commander';
import { runCommand } from './commands/run/index.js';
import { statusCommand } from './commands/status/index.js';

const program = new Command();

program
  .name('stepseq')
  .description('stepseq — ordered deployment step sequencer')
  .version('0.1.0');

program.addCommand(runCommand);
program.addCommand(statusCommand);

await program.parseAsync();
