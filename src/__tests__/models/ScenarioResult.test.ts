import {
  ScenarioStatus,
  getHttpStatus,
  invalidReturnRateError,
} from '../../models/ScenarioResult';

describe('getHttpStatus', () => {
  it('should answer 200 for every evaluated outcome', () => {
    const evaluated: ScenarioStatus[] = ['success', 'warning', 'not_achievable'];
    for (const status of evaluated) {
      expect(getHttpStatus(status)).toBe(200);
    }
  });

  it('should answer 400 for an error outcome', () => {
    expect(getHttpStatus('error')).toBe(400);
  });
});

describe('invalidReturnRateError', () => {
  it('should carry only status, message and rejection flag', () => {
    const error = invalidReturnRateError();
    expect(Object.keys(error).sort()).toEqual(['message', 'rejected', 'status']);
    expect(error.status).toBe('error');
    expect(error.rejected).toBe(true);
  });
});
