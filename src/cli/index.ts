#!/usr/bin/env node

import { createRequire } from 'node:module';
import { Command } from 'commander';
import { z } from 'zod';
import { registerChatCommand } from './commands/chat.js';
import { registerTranslateCommand } from './commands/translate.js';
import { registerHistoryCommand } from './commands/history.js';
import { registerServeCommand } from './commands/serve.js';
import { registerHealthCommand } from './commands/health.js';
import { errorMessage } from '../shared/Logger.js';

// 從 package.json 讀取版本號
const require = createRequire(import.meta.url);
const { version } = z.object({ version: z.string() }).parse(require('../../package.json'));

const program = new Command();

program
  .name('clipchat')
  .description('Chat with an LLM about the selected text and a screenshot of the screen')
  .version(version);

registerChatCommand(program);
registerTranslateCommand(program);
registerHistoryCommand(program);
registerServeCommand(program);
registerHealthCommand(program);

/** 全域錯誤處理 */
program.exitOverride();

const EXIT_ZERO_CODES = ['commander.helpDisplayed', 'commander.version', 'commander.help'];

function commanderCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const code = commanderCode(err);
    if (code !== undefined && EXIT_ZERO_CODES.includes(code)) {
      process.exit(0);
    }
    if (code === undefined || !code.startsWith('commander.')) {
      process.stderr.write(`Error: ${errorMessage(err)}\n`);
    }
    process.exit(1);
  }
}

void main();
