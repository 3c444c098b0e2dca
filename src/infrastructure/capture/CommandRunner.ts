import { spawn } from 'node:child_process';
import fs from 'node:fs/promises';
import path from 'node:path';

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  /** 正常結束且 exit code 為 0 */
  ok: boolean;
}

export interface RunCommandOptions {
  timeoutMs: number;
  /** 寫入 stdin 的內容；未指定時 stdin 為 ignore */
  input?: string;
}

export interface CommandRunner {
  run(command: string, args: string[], options: RunCommandOptions): Promise<CommandResult>;
}

/** 單一指令輸出上限，避免剪貼簿內容過大時吃光記憶體 */
const MAX_CAPTURE_CHARS = 4 * 1024 * 1024;

function appendCaptured(current: string, chunk: Buffer | string): string {
  if (current.length >= MAX_CAPTURE_CHARS) return current;
  const incoming = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
  return current + incoming.slice(0, MAX_CAPTURE_CHARS - current.length);
}

/**
 * 以 spawn 執行外部指令
 * 永遠 resolve：spawn 失敗（例如指令不存在）時 exitCode 為 null、ok 為 false，
 * 錯誤訊息放在 stderr
 */
export class SpawnCommandRunner implements CommandRunner {
  run(command: string, args: string[], options: RunCommandOptions): Promise<CommandResult> {
    return new Promise<CommandResult>((resolve) => {
      let stdout = '';
      let stderr = '';
      let exitCode: number | null = null;
      let timedOut = false;
      let settled = false;

      const child = spawn(command, args, {
        stdio: [options.input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
        windowsHide: true,
      });

      const timeoutHandle = setTimeout(() => {
        timedOut = true;
        child.kill('SIGTERM');
      }, options.timeoutMs);

      const settle = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutHandle);
        resolve({
          exitCode,
          stdout,
          stderr,
          timedOut,
          ok: !timedOut && exitCode === 0,
        });
      };

      child.stdout?.on('data', (chunk: Buffer | string) => {
        stdout = appendCaptured(stdout, chunk);
      });
      child.stderr?.on('data', (chunk: Buffer | string) => {
        stderr = appendCaptured(stderr, chunk);
      });

      child.on('error', (error) => {
        stderr = stderr ? `${stderr}\n${error.message}` : error.message;
        settle();
      });
      child.on('exit', (code) => {
        exitCode = code;
      });
      child.on('close', () => {
        settle();
      });

      if (options.input !== undefined && child.stdin) {
        // 子程序提早結束時 stdin 會 EPIPE，結果仍以 exit code 為準
        child.stdin.on('error', (error) => {
          stderr = stderr ? `${stderr}\n${error.message}` : error.message;
        });
        child.stdin.end(options.input);
      }
    });
  }
}

/** 在 PATH 中尋找可執行檔 */
export async function findOnPath(
  command: string,
  searchPath: string = process.env.PATH ?? '',
): Promise<string | undefined> {
  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, command);
    try {
      await fs.access(candidate, fs.constants.X_OK);
      return candidate;
    } catch {
      // 不在這個目錄，繼續找
    }
  }
  return undefined;
}
