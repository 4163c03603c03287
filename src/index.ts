#!/usr/bin/env node
import { program } from 'commander';
import { loadDotEnv } from './boundaries/dotenv-loader';
import { registerMainCommand } from './cli/commands';
import { APP_NAME, APP_VERSION } from './config/constants';

// Load environment variables at startup
loadDotEnv();

// Set up Commander program
program
  .name(APP_NAME)
  .description('Preview plain-text documents and split them into overlapping chunks')
  .version(APP_VERSION);

registerMainCommand(program);

program.parse();
