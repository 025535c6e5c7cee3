import { LOG_BUFFER_CAPACITY, LogBuffer, formatLogLine } from '../../../src/supervisor/log-buffer';

describe('LogBuffer', () => {
  const at = new Date(2024, 0, 1, 14, 3, 9, 750);

  it('should default to a capacity of 200 lines', () => {
    expect(new LogBuffer().capacity).toBe(LOG_BUFFER_CAPACITY);
    expect(LOG_BUFFER_CAPACITY).toBe(200);
  });

  it('should reject a non-positive capacity', () => {
    expect(() => new LogBuffer(0)).toThrow(RangeError);
    expect(() => new LogBuffer(1.5)).toThrow(RangeError);
  });

  describe('append', () => {
    it('should store the text with a timestamp truncated to seconds', () => {
      const buffer = new LogBuffer();

      const line = buffer.append('model loaded', at);

      expect(line.text).toBe('model loaded');
      expect(line.timestamp.getTime()).toBe(new Date(2024, 0, 1, 14, 3, 9).getTime());
    });

    it('should return frozen lines', () => {
      const buffer = new LogBuffer();

      const line = buffer.append('x', at);

      expect(Object.isFrozen(line)).toBe(true);
    });

    it('should evict the oldest line once full', () => {
      const buffer = new LogBuffer(3);

      ['a', 'b', 'c', 'd', 'e'].forEach((text) => buffer.append(text, at));

      expect(buffer.size).toBe(3);
      expect(buffer.getAll().map((line) => line.text)).toEqual(['c', 'd', 'e']);
    });

    it('should keep exactly the newest 200 after 205 appends', () => {
      const buffer = new LogBuffer();

      for (let i = 1; i <= 205; i++) {
        buffer.append(`line ${i}`, at);
      }

      const texts = buffer.getAll().map((line) => line.text);
      expect(texts).toHaveLength(200);
      expect(texts[0]).toBe('line 6');
      expect(texts[199]).toBe('line 205');
    });
  });

  describe('get', () => {
    let buffer: LogBuffer;

    beforeEach(() => {
      buffer = new LogBuffer();
      for (let i = 1; i <= 10; i++) {
        buffer.append(`line ${i}`, at);
      }
    });

    it('should return the last lines in insertion order', () => {
      expect(buffer.get(3).map((line) => line.text)).toEqual(['line 8', 'line 9', 'line 10']);
    });

    it('should return every line when asked for more than stored', () => {
      expect(buffer.get(30)).toHaveLength(10);
      expect(buffer.get(30)[0]?.text).toBe('line 1');
    });

    it('should return nothing for a count of zero', () => {
      expect(buffer.get(0)).toEqual([]);
    });

    it('should reject a negative or fractional count', () => {
      expect(() => buffer.get(-1)).toThrow(RangeError);
      expect(() => buffer.get(2.5)).toThrow(RangeError);
    });

    it('should return a copy the caller cannot use to mutate the buffer', () => {
      const lines = buffer.get(5);
      lines.pop();

      expect(buffer.get(5)).toHaveLength(5);
    });
  });

  describe('clear', () => {
    it('should remove every line', () => {
      const buffer = new LogBuffer();
      buffer.append('a', at);
      buffer.append('b', at);

      buffer.clear();

      expect(buffer.size).toBe(0);
      expect(buffer.get(50)).toEqual([]);
    });
  });

  describe('formatLogLine', () => {
    it('should prefix the text with the local wall-clock time', () => {
      const buffer = new LogBuffer();
      const line = buffer.append('Starting Alpha 7B...', new Date(2024, 0, 1, 9, 5, 7, 300));

      expect(formatLogLine(line)).toBe('[09:05:07] Starting Alpha 7B...');
    });
  });
});
