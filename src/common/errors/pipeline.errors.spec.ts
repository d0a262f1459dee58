import {
  classifyTargetError,
  ConstraintViolationError,
  CorruptRecordError,
  isRetryable,
  RunNotFoundError,
  SourceUnavailableError,
  sqlState,
  TargetUnavailableError,
  ValidationError,
} from './pipeline.errors';

describe('pipeline errors', () => {
  it('should only mark connectivity faults as retryable', () => {
    expect(isRetryable(new SourceUnavailableError('down'))).toBe(true);
    expect(isRetryable(new TargetUnavailableError('down'))).toBe(true);
    expect(isRetryable(new ValidationError('power', 'too high'))).toBe(false);
    expect(isRetryable(new Error('plain'))).toBe(false);
  });

  it('should name errors after their class', () => {
    const error = new RunNotFoundError('abc');

    expect(error.name).toBe('RunNotFoundError');
    expect(error.kind).toBe('RunNotFound');
    expect(error.message).toBe('Run not found: abc');
  });

  it('should describe a corrupt record by id and timestamp', () => {
    const error = new CorruptRecordError(12, new Date(Date.UTC(2024, 5, 1, 8)), 'power is not a finite number');

    expect(error.message).toBe(
      'Corrupt record id=12 timestamp=2024-06-01T08:00:00.000Z: power is not a finite number',
    );
  });

  describe('sqlState', () => {
    it('should read the code from a wrapped driver error', () => {
      expect(sqlState({ driverError: { code: '23505' } })).toBe('23505');
    });

    it('should read the code from the error itself', () => {
      expect(sqlState(Object.assign(new Error('x'), { code: '08006' }))).toBe('08006');
    });

    it('should return undefined for anything else', () => {
      expect(sqlState('boom')).toBeUndefined();
      expect(sqlState(new Error('no code'))).toBeUndefined();
    });
  });

  describe('classifyTargetError', () => {
    it('should map data exceptions to ConstraintViolation', () => {
      const classified = classifyTargetError(
        Object.assign(new Error('numeric field overflow'), { code: '22003' }),
        'Load',
      );

      expect(classified).toBeInstanceOf(ConstraintViolationError);
      expect(classified.message).toBe('Load: numeric field overflow (SQLSTATE 22003)');
    });

    it('should map connection failures to TargetUnavailable', () => {
      const classified = classifyTargetError(
        Object.assign(new Error('terminating connection'), { code: '57P01' }),
        'Load',
      );

      expect(classified).toBeInstanceOf(TargetUnavailableError);
    });

    it('should pass pipeline errors through unchanged', () => {
      const original = new ConstraintViolationError('missing signal');

      expect(classifyTargetError(original, 'Load')).toBe(original);
    });
  });
});
