import type { Command } from 'commander';
import { CaptureUseCase } from '../../application/CaptureUseCase.js';
import { TranslateUseCase } from '../../application/TranslateUseCase.js';
import { ClipChatError } from '../../domain/errors/DomainErrors.js';
import { SpawnCommandRunner } from '../../infrastructure/capture/CommandRunner.js';
import { CopyQClipboardWriter } from '../../infrastructure/capture/CopyQClipboardWriter.js';
import { NotifySendNotifier } from '../../infrastructure/notify/NotifySendNotifier.js';
import {
  createCaptureSources,
  createCompletionAdapter,
  loadCommandConfig,
  withCommonOptions,
  type CommonOptions,
} from './common.js';

interface TranslateOptions extends CommonOptions {
  model?: string;
  apiKey?: string;
  clipboard: boolean;
}

const MAX_PRINTED_LINES = 20;

/** 註冊 translate 指令 */
export function registerTranslateCommand(program: Command): void {
  withCommonOptions(
    program
      .command('translate')
      .description('Translate the selected word between Russian and other languages')
      .option('--model <id>', 'Translation model')
      .option('--api-key <key>', 'API key (overrides OPENROUTER_API_KEY)')
      .option('--no-clipboard', 'Do not add the translation to CopyQ'),
  ).action(async (opts: TranslateOptions) => {
    const config = loadCommandConfig(opts, {
      api: { translateModel: opts.model, apiKey: opts.apiKey },
    });

    const runner = new SpawnCommandRunner();
    const { commandTimeoutMs } = config.capture;
    const notifier = new NotifySendNotifier(runner, commandTimeoutMs);
    const useCase = new TranslateUseCase(
      new CaptureUseCase(createCaptureSources(config, runner)),
      createCompletionAdapter(config, config.api.translateModel),
      notifier,
      opts.clipboard ? new CopyQClipboardWriter(runner, commandTimeoutMs) : undefined,
    );

    try {
      const result = await useCase.translate();
      const lines = result.cleaned.split('\n').slice(0, MAX_PRINTED_LINES);
      process.stdout.write(lines.join('\n') + '\n');
    } catch (err) {
      if (err instanceof ClipChatError) {
        await notifier.notify('Translation Error', err.message, { urgency: 'critical' });
      }
      throw err;
    }
  });
}
