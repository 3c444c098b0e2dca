import type { Command } from 'commander';
import { JsonSessionStore } from '../../infrastructure/session/JsonSessionStore.js';
import { startTranscriptServer } from '../../server/TranscriptServer.js';
import { loadCommandConfig, withCommonOptions, type CommonOptions } from './common.js';

interface ServeOptions extends CommonOptions {
  port?: string;
}

/** 註冊 serve 指令 */
export function registerServeCommand(program: Command): void {
  withCommonOptions(
    program
      .command('serve')
      .description('Serve stored transcripts over HTTP on 127.0.0.1')
      .option('--port <number>', 'Port to listen on (default: 8085)'),
  ).action(async (opts: ServeOptions) => {
    const config = loadCommandConfig(opts, {
      server: { port: opts.port === undefined ? undefined : Number(opts.port) },
    });
    const store = new JsonSessionStore(config.storage.historyDir);

    const server = await startTranscriptServer(store, config.server.port);
    process.stderr.write(`Serving transcripts on http://127.0.0.1:${config.server.port}\n`);

    await new Promise<void>((resolve, reject) => {
      process.once('SIGINT', () => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    });
  });
}
