import { parseRequest } from '../../../src/middleware/validation';
import { logsQuerySchema, startParamsSchema } from '../../../src/routes/schemas';
import { ValidationError } from '../../../src/utils';

describe('parseRequest', () => {
  describe('logs query', () => {
    it('should default to 50 lines', () => {
      expect(parseRequest(logsQuerySchema, {})).toEqual({ lines: 50 });
    });

    it('should coerce the query string value', () => {
      expect(parseRequest(logsQuerySchema, { lines: '30' })).toEqual({ lines: 30 });
      expect(parseRequest(logsQuerySchema, { lines: '0' })).toEqual({ lines: 0 });
    });

    it('should reject negative counts', () => {
      expect(() => parseRequest(logsQuerySchema, { lines: '-1' })).toThrow(
        new ValidationError('lines: lines must not be negative')
      );
    });

    it('should reject fractional counts', () => {
      expect(() => parseRequest(logsQuerySchema, { lines: '2.5' })).toThrow('lines: lines must be an integer');
    });

    it('should reject non-numeric counts', () => {
      expect(() => parseRequest(logsQuerySchema, { lines: 'abc' })).toThrow(ValidationError);
    });
  });

  describe('start params', () => {
    it('should accept a model id', () => {
      expect(parseRequest(startParamsSchema, { modelId: 'alpha' })).toEqual({ modelId: 'alpha' });
    });

    it('should reject an empty model id', () => {
      expect(() => parseRequest(startParamsSchema, { modelId: '' })).toThrow('modelId: Model id is required');
    });
  });
});
