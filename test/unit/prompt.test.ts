import { createFixedPrompt } from '../../src/prompt.js';

describe('createFixedPrompt', () => {
  it('answers every question the same way', async () => {
    const yes = createFixedPrompt(true);
    expect(await yes.confirm('Install Waydroid (Android emulator)?', false)).toBe(true);
    expect(await createFixedPrompt(false).confirm('Anything?')).toBe(false);
  });
});
