import { createLogger } from '../src/utils/logger';

describe('createLogger', () => {
  const original = process.env.LASERMAP_DEBUG;

  afterEach(() => {
    if (original === undefined) {
      delete process.env.LASERMAP_DEBUG;
    } else {
      process.env.LASERMAP_DEBUG = original;
    }
    jest.restoreAllMocks();
  });

  it('prefixes messages with the tag', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    createLogger('PointRegistry').warn('Analysis point not found:', 3);
    expect(warn).toHaveBeenCalledWith('[PointRegistry]', 'Analysis point not found:', 3);
  });

  it('prints debug output only when LASERMAP_DEBUG is set', () => {
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    const log = createLogger('Recoordination');

    delete process.env.LASERMAP_DEBUG;
    log.debug('hidden');
    process.env.LASERMAP_DEBUG = '1';
    log.debug('shown');

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith('[Recoordination]', 'shown');
  });
});
