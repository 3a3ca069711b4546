import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';
import { setImmediate as nextTick } from 'timers/promises';
import { GroupPrompt } from '@/cli/prompt.js';

function streams() {
  return { input: new PassThrough(), output: new PassThrough() };
}

describe('GroupPrompt', () => {
  it('returns the trimmed answer', async () => {
    const io = streams();
    const prompt = new GroupPrompt(io);
    const answer = prompt.ask();

    io.input.write('  Comment Crew  \n');

    await expect(answer).resolves.toBe('Comment Crew');
    prompt.close();
  });

  it('asks again after a blank answer', async () => {
    const io = streams();
    const prompt = new GroupPrompt(io);
    const answer = prompt.ask();

    io.input.write('   \n');
    await nextTick();
    io.input.write('G0006\n');

    await expect(answer).resolves.toBe('G0006');
    expect(String(io.output.read())).toContain('Please enter a valid APT group name or ID.');
    prompt.close();
  });

  it('hands out answers piped in one chunk across questions', async () => {
    const io = streams();
    const prompt = new GroupPrompt(io);

    io.input.end('Aptt1\nAPT1\n');

    await expect(prompt.ask()).resolves.toBe('Aptt1');
    await expect(prompt.ask()).resolves.toBe('APT1');
    await expect(prompt.ask()).rejects.toThrow('Input closed before a group was entered');
    prompt.close();
  });

  it('rejects when input closes first', async () => {
    const io = streams();
    const prompt = new GroupPrompt(io);
    const answer = prompt.ask();

    io.input.end();

    await expect(answer).rejects.toThrow('Input closed before a group was entered');
    prompt.close();
  });

  it('closes without having asked', () => {
    expect(() => new GroupPrompt(streams()).close()).not.toThrow();
  });
});
