import { MissingStatisticError } from '../src/errors';
import { logger } from '../src/logger';

describe('logger', () => {
  afterEach(() => {
    delete process.env.HEATMAP_LOG_LEVEL;
    jest.restoreAllMocks();
  });

  it('should drop debug output at the default level', () => {
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => {});

    logger.debug('ctx', 'hidden');

    expect(debug).not.toHaveBeenCalled();
  });

  it('should prefix messages with their context', () => {
    process.env.HEATMAP_LOG_LEVEL = 'debug';
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => {});

    logger.debug('ctx', 'hello');
    logger.debug('ctx', { streakMax: 3 });

    expect(debug).toHaveBeenNthCalledWith(1, '[heatmap] ctx: hello');
    expect(debug).toHaveBeenNthCalledWith(2, '[heatmap] ctx: {"streakMax":3}');
  });

  it('should format errors by name and message', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => {});

    logger.error('ctx', new MissingStatisticError('streak_max'));

    expect(error).toHaveBeenCalledWith(
      '[heatmap] ctx: MissingStatisticError: Activity snapshot is missing statistic "streak_max"'
    );
  });

  it('should stay quiet when silenced', () => {
    process.env.HEATMAP_LOG_LEVEL = 'silent';
    const error = jest.spyOn(console, 'error').mockImplementation(() => {});

    logger.error('ctx', 'boom');

    expect(error).not.toHaveBeenCalled();
  });
});
