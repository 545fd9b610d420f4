import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';
import { ReadlineConfirmer } from '../../../src/cli/utils/prompt.js';
import { isAffirmative } from '../../../src/models/OutputSink.js';

describe('ReadlineConfirmer', () => {
  it('should return the typed answer', async () => {
    const input = new PassThrough();
    const confirmer = new ReadlineConfirmer(input, new PassThrough());

    const answer = confirmer.ask('Proceed with installation? (yes/no): ');
    input.write('yes\n');

    expect(await answer).toBe('yes');
    confirmer.close();
  });

  it('should answer empty when input closes', async () => {
    const input = new PassThrough();
    const confirmer = new ReadlineConfirmer(input, new PassThrough());

    const answer = confirmer.ask('Proceed with installation? (yes/no): ');
    input.end();

    expect(await answer).toBe('');
  });

  it('should answer consecutive questions from lines piped in ahead of time', async () => {
    const input = new PassThrough();
    const confirmer = new ReadlineConfirmer(input, new PassThrough());
    input.write('yes\nno\n');

    expect(await confirmer.ask('Would you like to download and install it? (yes/no): ')).toBe('yes');
    expect(await confirmer.ask('Proceed with installation? (yes/no): ')).toBe('no');
    confirmer.close();
  });

  it('should keep answering after input has ended', async () => {
    const input = new PassThrough();
    const confirmer = new ReadlineConfirmer(input, new PassThrough());
    input.end('yes\nyes\n');

    expect(await confirmer.ask('Would you like to download and install it? (yes/no): ')).toBe('yes');
    expect(await confirmer.ask('Proceed with installation? (yes/no): ')).toBe('yes');
    expect(await confirmer.ask('Anything else? (yes/no): ')).toBe('');
  });

  it('should answer empty once closed', async () => {
    const confirmer = new ReadlineConfirmer(new PassThrough(), new PassThrough());

    const first = confirmer.ask('Proceed with installation? (yes/no): ');
    confirmer.close();

    expect(await first).toBe('');
    expect(await confirmer.ask('Proceed with installation? (yes/no): ')).toBe('');
  });
});

describe('isAffirmative', () => {
  it('should accept only the word yes', () => {
    expect(isAffirmative('yes')).toBe(true);
    expect(isAffirmative(' YES\n')).toBe(true);
    expect(isAffirmative('y')).toBe(false);
    expect(isAffirmative('no')).toBe(false);
    expect(isAffirmative('')).toBe(false);
  });
});
