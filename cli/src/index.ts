#!/usr/bin/env node

import { Command } from 'commander';
import { uploadCommand } from './commands/upload';
import { listCommand } from './commands/list';
import { getCommand } from './commands/get';
import { exportCommand } from './commands/export';
import { deleteCommand } from './commands/delete';

const program = new Command();

program
  .name('txdocs')
  .description('Manage documents stored per transaction')
  .version('1.0.0');

program.addCommand(uploadCommand);
program.addCommand(listCommand);
program.addCommand(getCommand);
program.addCommand(exportCommand);
program.addCommand(deleteCommand);

program.parse();
