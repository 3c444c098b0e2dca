import { describe, it, expect } from 'vitest';
import { CaptureUseCase } from '../../../src/application/CaptureUseCase.js';
import {
  TRANSLATE_PROMPT,
  TranslateUseCase,
  cleanTranslation,
  summarizeTranslation,
} from '../../../src/application/TranslateUseCase.js';
import { NoTextAvailableError, UnauthorizedError } from '../../../src/domain/errors/DomainErrors.js';
import type { ClipboardWriter } from '../../../src/domain/ports/CapturePort.js';
import { RecordingNotifier, ScriptedCompletion } from '../../helpers/fakes.js';

function captureOf(text: string | undefined): CaptureUseCase {
  return new CaptureUseCase({
    text: [{ id: 'fixed', read: async () => text }],
    screenshot: [],
    hosts: [],
  });
}

class RecordingClipboard implements ClipboardWriter {
  readonly written: string[] = [];
  constructor(private readonly fail = false) {}

  async write(text: string): Promise<void> {
    if (this.fail) throw new Error('copyq add failed: exit code 1');
    this.written.push(text);
  }
}

const REPLY = [
  '**Перевод:** привет',
  '',
  '*Examples:*',
  '---',
  '1. Hello,   friend',
].join('\n');

/**
 * Feature: 翻譯選取的單字
 */
describe('TranslateUseCase', () => {
  it('should send the fixed prompt and return the cleaned reply', async () => {
    const completion = new ScriptedCompletion([REPLY]);
    const notifier = new RecordingNotifier();
    const clipboard = new RecordingClipboard();
    const useCase = new TranslateUseCase(captureOf('hello'), completion, notifier, clipboard);

    const result = await useCase.translate();

    expect(completion.requests).toEqual([[{ role: 'user', content: `${TRANSLATE_PROMPT}hello` }]]);
    expect(result.cleaned).toBe('Перевод: привет\n\nExamples:\n\n1. Hello,   friend');
    expect(result.summary).toBe('Перевод: привет Examples:');
    expect(result.copied).toBe(true);
    expect(clipboard.written).toEqual([REPLY]);
    expect(notifier.sent).toEqual([
      { title: 'Translation', body: 'Calling translation API...', options: { timeoutMs: 2000 } },
      { title: 'Translation', body: 'Перевод: привет Examples:', options: { timeoutMs: 8000 } },
    ]);
  });

  it('should skip the clipboard when none is given', async () => {
    const useCase = new TranslateUseCase(captureOf('hello'), new ScriptedCompletion(['hi']), new RecordingNotifier());

    expect((await useCase.translate()).copied).toBe(false);
  });

  it('should still return the translation when the clipboard write fails', async () => {
    const useCase = new TranslateUseCase(
      captureOf('hello'),
      new ScriptedCompletion(['привет']),
      new RecordingNotifier(),
      new RecordingClipboard(true),
    );

    const result = await useCase.translate();

    expect(result.translation).toBe('привет');
    expect(result.copied).toBe(false);
  });

  it('should fail before calling the API when nothing is selected', async () => {
    const completion = new ScriptedCompletion([]);
    const notifier = new RecordingNotifier();
    const useCase = new TranslateUseCase(captureOf(undefined), completion, notifier);

    await expect(useCase.translate()).rejects.toBeInstanceOf(NoTextAvailableError);
    expect(completion.requests).toHaveLength(0);
    expect(notifier.sent).toEqual([]);
  });

  it('should propagate API errors', async () => {
    const useCase = new TranslateUseCase(
      captureOf('hello'),
      new ScriptedCompletion([new UnauthorizedError('API rejected the credentials (HTTP 401)')]),
      new RecordingNotifier(),
    );

    await expect(useCase.translate()).rejects.toThrow('API rejected the credentials (HTTP 401)');
  });
});

describe('cleanTranslation / summarizeTranslation', () => {
  it('should strip emphasis markers and separators', () => {
    expect(cleanTranslation('**bold** *it* ---')).toBe('bold it ');
  });

  it('should join the first three lines and collapse spaces', () => {
    expect(summarizeTranslation('a  b\nc\nd\ne')).toBe('a b c d');
  });
});
