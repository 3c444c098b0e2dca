import type { DesktopNotifier, NotifyOptions } from '../../domain/ports/PresenterPort.js';
import type { CommandRunner } from '../capture/CommandRunner.js';
import { Logger } from '../../shared/Logger.js';

/**
 * 透過 notify-send 發送桌面通知
 * 通知失敗（例如沒有 notification daemon）只記錄 log，不影響主流程
 */
export class NotifySendNotifier implements DesktopNotifier {
  private readonly logger = new Logger('NotifySendNotifier');

  constructor(
    private readonly runner: CommandRunner,
    private readonly commandTimeoutMs: number,
  ) {}

  async notify(title: string, body: string, options: NotifyOptions = {}): Promise<void> {
    const args = ['-t', String(options.timeoutMs ?? 3000)];
    if (options.urgency) args.push('-u', options.urgency);
    args.push(title, body);

    const result = await this.runner.run('notify-send', args, { timeoutMs: this.commandTimeoutMs });
    if (!result.ok) {
      this.logger.debug('notify-send failed', { exitCode: result.exitCode, stderr: result.stderr.trim() });
    }
  }
}
