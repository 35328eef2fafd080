import { statusFor } from './respond';
import { storeErrors } from '../storage/errors';

describe('statusFor', () => {
  it('maps store errors to HTTP statuses', () => {
    expect(statusFor(storeErrors.notFound('gone'))).toBe(404);
    expect(statusFor(storeErrors.operation('bad date', 'invalid_input'))).toBe(400);
    expect(statusFor(storeErrors.operation('taken', 'conflict'))).toBe(409);
    expect(statusFor(storeErrors.operation('busy', 'retry_exhausted'))).toBe(503);
    expect(statusFor(storeErrors.connection('down'))).toBe(503);
    expect(statusFor(storeErrors.operation('boom'))).toBe(500);
    expect(statusFor(storeErrors.serialization('corrupt'))).toBe(500);
  });
});
