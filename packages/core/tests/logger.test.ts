import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger } from '../src/logger.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops progress messages unless verbose', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    createLogger('Fit').info('quiet');
    createLogger('Fit', { verbose: true }).info('loud');

    expect(debug).toHaveBeenCalledOnce();
    expect(debug).toHaveBeenCalledWith('[Trimfit:Fit] loud');
  });

  it('always prints errors with the namespace prefix', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const cause = new Error('disk full');

    createLogger('Pipeline').error('cleanup failed', cause);
    createLogger('Cli').error('plain');

    expect(error).toHaveBeenNthCalledWith(1, '[Trimfit:Pipeline] cleanup failed', cause);
    expect(error).toHaveBeenNthCalledWith(2, '[Trimfit:Cli] plain');
  });
});
