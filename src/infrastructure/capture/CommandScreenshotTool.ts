import type { ScreenshotTool } from '../../domain/ports/CapturePort.js';
import type { CommandRunner } from './CommandRunner.js';

/** 以外部截圖程式寫出 PNG；{path} 會被替換成目標路徑 */
export class CommandScreenshotTool implements ScreenshotTool {
  constructor(
    readonly id: string,
    private readonly command: string,
    private readonly argsTemplate: string[],
    private readonly runner: CommandRunner,
    private readonly timeoutMs: number,
  ) {}

  async capture(targetPath: string): Promise<boolean> {
    const args = this.argsTemplate.map((arg) => (arg === '{path}' ? targetPath : arg));
    const result = await this.runner.run(this.command, args, { timeoutMs: this.timeoutMs });
    return result.ok;
  }
}

/** ImageMagick import → scrot → gnome-screenshot */
export function createDefaultScreenshotTools(runner: CommandRunner, timeoutMs: number): ScreenshotTool[] {
  return [
    new CommandScreenshotTool('imagemagick-import', 'import', ['-window', 'root', '{path}'], runner, timeoutMs),
    new CommandScreenshotTool('scrot', 'scrot', ['{path}'], runner, timeoutMs),
    new CommandScreenshotTool('gnome-screenshot', 'gnome-screenshot', ['-f', '{path}'], runner, timeoutMs),
  ];
}
