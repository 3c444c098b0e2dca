import type { Command } from 'commander';
import { JsonSessionStore } from '../../infrastructure/session/JsonSessionStore.js';
import { OutputFormatter, parseOutputFormat } from '../formatters/OutputFormatter.js';
import { loadCommandConfig, withCommonOptions, type CommonOptions } from './common.js';

interface HistoryOptions extends CommonOptions {
  format: string;
}

/** 註冊 history 指令群組 */
export function registerHistoryCommand(program: Command): void {
  const historyCmd = program
    .command('history')
    .description('Inspect stored chat sessions');

  withCommonOptions(
    historyCmd
      .command('list')
      .description('List stored sessions, newest first')
      .option('--format <format>', 'Output format: json or text', 'text'),
  ).action(async (opts: HistoryOptions) => {
    const format = parseOutputFormat(opts.format);
    const config = loadCommandConfig(opts);
    const store = new JsonSessionStore(config.storage.historyDir);

    const sessions = await store.list();
    process.stdout.write(new OutputFormatter().formatSessionList(sessions, format) + '\n');
  });

  withCommonOptions(
    historyCmd
      .command('show <sessionId>')
      .description('Show one session transcript')
      .option('--format <format>', 'Output format: json or text', 'text'),
  ).action(async (sessionId: string, opts: HistoryOptions) => {
    const format = parseOutputFormat(opts.format);
    const config = loadCommandConfig(opts);
    const store = new JsonSessionStore(config.storage.historyDir);

    const session = await store.load(sessionId);
    const output = format === 'json'
      ? JSON.stringify(session, null, 2)
      : new OutputFormatter().formatTranscript(session);
    process.stdout.write(output + '\n');
  });
}
