import type { Command } from 'commander';
import { loadConfig, loadDotEnv, requireApiKey } from '../../config/ConfigLoader.js';
import type { ClipChatConfig, PartialConfig } from '../../config/types.js';
import type { CaptureSources } from '../../application/CaptureUseCase.js';
import type { CommandRunner } from '../../infrastructure/capture/CommandRunner.js';
import { createDefaultTextSources } from '../../infrastructure/capture/CommandTextSource.js';
import { createDefaultScreenshotTools } from '../../infrastructure/capture/CommandScreenshotTool.js';
import { createDefaultImageHosts } from '../../infrastructure/capture/MultipartImageHost.js';
import { HttpCompletionAdapter } from '../../infrastructure/llm/HttpCompletionAdapter.js';
import { Logger } from '../../shared/Logger.js';

export interface CommonOptions {
  config?: string;
  verbose?: boolean;
}

/** 每個指令都接受 --config 與 --verbose */
export function withCommonOptions(command: Command): Command {
  return command
    .option('--config <path>', 'Config file (default: ~/.clipchat.json)')
    .option('-v, --verbose', 'Log debug output to stderr');
}

/** 讀取 .env、設定檔與環境變數，並套用 log level */
export function loadCommandConfig(opts: CommonOptions, overrides?: PartialConfig): ClipChatConfig {
  loadDotEnv();
  const config = loadConfig({ configPath: opts.config, overrides });
  Logger.setDefaultLevel(opts.verbose ? 'debug' : config.logLevel);
  return config;
}

export function createCaptureSources(config: ClipChatConfig, runner: CommandRunner): CaptureSources {
  const { commandTimeoutMs, uploadTimeoutMs } = config.capture;
  return {
    text: createDefaultTextSources(runner, commandTimeoutMs),
    screenshot: createDefaultScreenshotTools(runner, commandTimeoutMs),
    hosts: createDefaultImageHosts(uploadTimeoutMs),
  };
}

export function createCompletionAdapter(config: ClipChatConfig, model: string): HttpCompletionAdapter {
  return new HttpCompletionAdapter({
    baseUrl: config.api.baseUrl,
    apiKey: requireApiKey(config),
    model,
    timeoutMs: config.api.timeoutMs,
  });
}
