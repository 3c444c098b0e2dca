import type { ClipboardWriter } from '../../domain/ports/CapturePort.js';
import type { CommandRunner } from './CommandRunner.js';

/** 透過 `copyq add -` 將文字加入 CopyQ 歷史 */
export class CopyQClipboardWriter implements ClipboardWriter {
  constructor(
    private readonly runner: CommandRunner,
    private readonly timeoutMs: number,
  ) {}

  async write(text: string): Promise<void> {
    const result = await this.runner.run('copyq', ['add', '-'], { timeoutMs: this.timeoutMs, input: text });
    if (!result.ok) {
      const reason = result.timedOut ? 'timed out' : (result.stderr.trim() || `exit code ${result.exitCode}`);
      throw new Error(`copyq add failed: ${reason}`);
    }
  }
}
