import { describe, expect, it } from 'vitest';
import { textToFile } from './text-file.js';

describe('textToFile', () => {
  it('defaults to file.txt with the text as UTF-8 bytes', () => {
    const file = textToFile('héllo');
    expect(file.name).toBe('file.txt');
    expect(file.data.toString('utf8')).toBe('héllo');
    expect(file.data.length).toBe(6);
  });

  it('uses the given name', () => {
    expect(textToFile('x', { fileName: 'log.md' }).name).toBe('log.md');
  });

  it('marks spoilers in the name', () => {
    expect(textToFile('x', { fileName: 'ending.txt', spoiler: true }).name).toBe('SPOILER_ending.txt');
    expect(textToFile('x', { spoiler: true }).name).toBe('SPOILER_file.txt');
  });
});
