import type { ClipChatConfig } from './types.js';

export const DEFAULT_CONFIG_FILE = '~/.clipchat.json';

export const DEFAULT_CONFIG: ClipChatConfig = {
  api: {
    apiKey: '',
    baseUrl: 'https://openrouter.ai/api/v1',
    model: 'openrouter/sonoma-sky-alpha',
    translateModel: 'nvidia/nemotron-nano-9b-v2:free',
    multimodalModels: [
      'anthropic/claude-3.5-sonnet',
      'anthropic/claude-3.5-haiku',
      'anthropic/claude-3-haiku',
      'anthropic/claude-3-opus',
      'openai/gpt-4o',
      'openai/gpt-4o-mini',
      'openai/chatgpt-4o-latest',
      'meta-llama/llama-3.2-90b-vision-instruct',
      'meta-llama/llama-3.2-11b-vision-instruct',
      'x-ai/grok-2-vision-1212',
      'openrouter/sonoma-sky-alpha',
    ],
    timeoutMs: 60000,
  },
  storage: {
    historyDir: '~/.copyq_chat_history',
    screenshotDir: '~/.copyq_screenshots',
  },
  capture: {
    screenshot: true,
    commandTimeoutMs: 2000,
    uploadTimeoutMs: 10000,
  },
  server: {
    port: 8085,
  },
  logLevel: 'warn',
};
