import { describe, it, expect } from 'vitest';
import { SEED_MARKER, isSeedMessage, renderSeed } from '../../../src/domain/value-objects/SeedTemplate.js';
import type { Message } from '../../../src/domain/entities/Session.js';

describe('SeedTemplate', () => {
  const timestamp = '2024-01-01T00:00:00.000Z';

  it('should embed the captured text verbatim in quotes', () => {
    const seed = renderSeed('say "hi"\nline two');

    expect(seed.split('\n')[0]).toBe(`${SEED_MARKER} "say "hi"`);
    expect(seed).toContain('line two"');
    expect(seed).toContain('I also took a screenshot of my current screen (if available).');
  });

  it('should recognize the seed only at index 0', () => {
    const seed: Message = { role: 'user', content: renderSeed('hello'), timestamp };

    expect(isSeedMessage(seed, 0)).toBe(true);
    expect(isSeedMessage(seed, 1)).toBe(false);
  });

  it('should not treat other first messages as the seed', () => {
    const assistant: Message = { role: 'assistant', content: renderSeed('x'), timestamp };
    const plain: Message = { role: 'user', content: 'what does this mean?', timestamp };
    const multipart: Message = { role: 'user', content: [{ kind: 'text', text: SEED_MARKER }], timestamp };

    expect(isSeedMessage(assistant, 0)).toBe(false);
    expect(isSeedMessage(plain, 0)).toBe(false);
    expect(isSeedMessage(multipart, 0)).toBe(false);
  });
});
