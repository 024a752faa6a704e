import { StructuredLoggerService } from '../../src/common/logging/structured-logger.service';

/** A real logger whose level methods are spies that print nothing. */
export function silentLogger(): StructuredLoggerService {
  const logger = new StructuredLoggerService();
  for (const level of ['debug', 'info', 'warn', 'error'] as const) {
    jest.spyOn(logger, level).mockImplementation(() => undefined);
  }
  return logger;
}
