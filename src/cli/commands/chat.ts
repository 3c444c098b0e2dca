import type { Command } from 'commander';
import path from 'node:path';
import { CaptureUseCase } from '../../application/CaptureUseCase.js';
import { ChatUseCase } from '../../application/ChatUseCase.js';
import { MessageBuilder } from '../../application/MessageBuilder.js';
import { supportsImageInput } from '../../config/ConfigLoader.js';
import type { CapturedContent } from '../../domain/entities/Session.js';
import { NoTextAvailableError } from '../../domain/errors/DomainErrors.js';
import { SpawnCommandRunner } from '../../infrastructure/capture/CommandRunner.js';
import { NotifySendNotifier } from '../../infrastructure/notify/NotifySendNotifier.js';
import { JsonSessionStore } from '../../infrastructure/session/JsonSessionStore.js';
import { TerminalPresenter } from '../presenters/TerminalPresenter.js';
import {
  createCaptureSources,
  createCompletionAdapter,
  loadCommandConfig,
  withCommonOptions,
  type CommonOptions,
} from './common.js';

interface ChatOptions extends CommonOptions {
  model?: string;
  apiKey?: string;
  resume?: string;
  screenshot: boolean;
  notify?: boolean;
}

/** 註冊 chat 指令（預設指令） */
export function registerChatCommand(program: Command): void {
  withCommonOptions(
    program
      .command('chat', { isDefault: true })
      .description('Capture the selected text and a screenshot, then chat about them')
      .option('--model <id>', 'Completion model')
      .option('--api-key <key>', 'API key (overrides OPENROUTER_API_KEY)')
      .option('--resume <sessionId>', 'Continue a stored session')
      .option('--no-screenshot', 'Skip the screenshot')
      .option('--notify', 'Also send warnings and errors as desktop notifications'),
  ).action(async (opts: ChatOptions) => {
    const config = loadCommandConfig(opts, {
      api: { model: opts.model, apiKey: opts.apiKey },
      capture: { screenshot: opts.screenshot ? undefined : false },
    });

    const runner = new SpawnCommandRunner();
    const notifier = new NotifySendNotifier(runner, config.capture.commandTimeoutMs);
    const store = new JsonSessionStore(config.storage.historyDir);
    const completion = createCompletionAdapter(config, config.api.model);
    const presenter = new TerminalPresenter({ notifier: opts.notify ? notifier : undefined });
    const builder = new MessageBuilder({ imageParts: supportsImageInput(config) });
    const chat = new ChatUseCase(store, builder, completion, presenter);

    try {
      if (opts.resume) {
        await chat.resume(opts.resume);
      } else {
        const sessionId = await store.nextSessionId();
        const capture = new CaptureUseCase(createCaptureSources(config, runner), presenter);
        const screenshotPath = config.capture.screenshot
          ? path.join(config.storage.screenshotDir, `screenshot_${sessionId}.png`)
          : undefined;

        let content: CapturedContent;
        try {
          content = await capture.resolve({ screenshotPath });
        } catch (err) {
          if (err instanceof NoTextAvailableError) {
            await notifier.notify('clipchat', err.message, { urgency: 'critical' });
          }
          throw err;
        }
        await chat.start(content, sessionId);
      }

      const termination = await chat.run();
      if (termination.reason === 'store-failure') process.exitCode = 1;
    } finally {
      presenter.close();
    }
  });
}
