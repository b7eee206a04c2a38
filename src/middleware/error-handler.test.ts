import {
  InvalidDateError,
  InvalidLocationError,
  RequestCancelledError,
  RequestValidationError
} from '../errors/route-risk.errors';
import { toErrorResponse } from './error-handler';

describe('toErrorResponse', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should map an unknown port to 400', () => {
    expect(toErrorResponse(new InvalidLocationError('Unknown location: Atlantis', 'Atlantis'))).toEqual({
      status: 400,
      body: { success: false, error: 'Unknown location: Atlantis' }
    });
  });

  it('should map a date outside the window to 400', () => {
    const response = toErrorResponse(new InvalidDateError('Departure date 2020-01-01 is in the past', '2020-01-01'));

    expect(response.status).toBe(400);
  });

  it('should list validation issues', () => {
    const error = new RequestValidationError('Invalid request: query is required', ['query: query is required']);

    expect(toErrorResponse(error)).toEqual({
      status: 400,
      body: { success: false, error: 'Invalid request', details: ['query: query is required'] }
    });
  });

  // Test: Malformed JSON from the body parser is a client error
  it('should map a body parse failure to 400', () => {
    const error = Object.assign(new SyntaxError('Unexpected token } in JSON'), { body: '{"a":}' });

    expect(toErrorResponse(error)).toEqual({
      status: 400,
      body: { success: false, error: 'Malformed JSON body' }
    });
  });

  it('should map cancellation to 499', () => {
    expect(toErrorResponse(new RequestCancelledError())).toEqual({
      status: 499,
      body: { success: false, error: 'Request was cancelled by the caller' }
    });
  });

  it('should map anything else to 500', () => {
    expect(toErrorResponse(new Error('Reference data not loaded'))).toEqual({
      status: 500,
      body: { success: false, error: 'Reference data not loaded' }
    });
    expect(toErrorResponse('oops').body.error).toBe('Unknown error occurred');
  });
});
