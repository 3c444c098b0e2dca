import type { TextSource } from '../../domain/ports/CapturePort.js';
import type { CommandRunner } from './CommandRunner.js';

/**
 * 以外部指令讀取文字
 * 非 0 exit、逾時或只有空白的輸出都回傳 undefined；
 * 結尾換行比照 shell command substitution 去除，其餘原樣保留
 */
export class CommandTextSource implements TextSource {
  constructor(
    readonly id: string,
    private readonly command: string,
    private readonly args: string[],
    private readonly runner: CommandRunner,
    private readonly timeoutMs: number,
  ) {}

  async read(): Promise<string | undefined> {
    const result = await this.runner.run(this.command, this.args, { timeoutMs: this.timeoutMs });
    if (!result.ok) return undefined;

    const text = result.stdout.replace(/\n+$/, '');
    return text.trim() ? text : undefined;
  }
}

/**
 * 預設的文字 cascade，依序：
 * X11 primary selection → CopyQ selection → xsel → CopyQ clipboard
 */
export function createDefaultTextSources(runner: CommandRunner, timeoutMs: number): TextSource[] {
  return [
    new CommandTextSource('xclip-primary', 'xclip', ['-selection', 'primary', '-o'], runner, timeoutMs),
    new CommandTextSource('copyq-selection', 'copyq', ['selection'], runner, timeoutMs),
    new CommandTextSource('xsel-primary', 'xsel', ['-p'], runner, timeoutMs),
    new CommandTextSource('copyq-clipboard', 'copyq', ['clipboard'], runner, timeoutMs),
  ];
}
