import {
  ApplicationError,
  ToolNotFoundError,
  ConfigurationError,
  InvalidStateError,
  SessionBusyError,
  StorageError,
  ValidationError,
  ParseFailure,
  ProviderError,
  ToolError,
  TimeoutError,
  CancellationError,
} from '../errors';

describe('Core Errors', () => {
  describe('ApplicationError', () => {
    it('should create an instance with message and name', () => {
      const error = new ApplicationError('Test app error');
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(ApplicationError);
      expect(error.message).toBe('Test app error');
      expect(error.name).toBe('ApplicationError');
      expect(error.metadata).toBeUndefined();
    });

    it('should keep metadata', () => {
      const meta = { code: 123, details: 'some details' };
      const error = new ApplicationError('Test app error with meta', meta);
      expect(error.metadata).toEqual(meta);
    });
  });

  describe('ToolNotFoundError', () => {
    it('should create an instance with default message', () => {
      const error = new ToolNotFoundError('myTool');
      expect(error).toBeInstanceOf(ApplicationError);
      expect(error.message).toBe('Tool "myTool" not found.');
      expect(error.name).toBe('ToolNotFoundError');
      expect(error.metadata).toEqual({ toolName: 'myTool' });
    });

    it('should accept a custom message', () => {
      const error = new ToolNotFoundError('myTool', 'Custom message');
      expect(error.message).toBe('Custom message');
    });
  });

  describe('SessionBusyError', () => {
    it('should be an InvalidStateError naming the session', () => {
      const error = new SessionBusyError('session-1');
      expect(error).toBeInstanceOf(InvalidStateError);
      expect(error.name).toBe('SessionBusyError');
      expect(error.sessionId).toBe('session-1');
      expect(error.message).toBe('Session "session-1" is already processing a request.');
    });
  });

  describe('ValidationError', () => {
    it('should carry validation details', () => {
      const error = new ValidationError('Invalid input', { field: 'required' }, { source: 'test' });
      expect(error.name).toBe('ValidationError');
      expect(error.validationDetails).toEqual({ field: 'required' });
      expect(error.metadata).toEqual({ source: 'test' });
    });
  });

  describe('ParseFailure', () => {
    it('should keep the rejected candidate', () => {
      const error = new ParseFailure('Invalid JSON', '{"action": ', { source: 'embedded' });
      expect(error.name).toBe('ParseFailure');
      expect(error.candidate).toBe('{"action": ');
      expect(error.metadata).toEqual({ source: 'embedded' });
    });
  });

  describe('ProviderError', () => {
    it('should expose status, retryable and retryAfterMs', () => {
      const error = new ProviderError('Rate limited', { status: 429, retryable: true, retryAfterMs: 2000 }, { provider: 'openai' });
      expect(error.name).toBe('ProviderError');
      expect(error.status).toBe(429);
      expect(error.retryable).toBe(true);
      expect(error.retryAfterMs).toBe(2000);
      expect(error.metadata).toEqual({ provider: 'openai', status: 429, retryable: true });
    });
  });

  describe('ToolError', () => {
    it('should record the tool name in metadata', () => {
      const error = new ToolError('shell_tool', 'boom');
      expect(error.name).toBe('ToolError');
      expect(error.metadata).toEqual({ toolName: 'shell_tool' });
    });
  });

  describe('TimeoutError', () => {
    it('should carry the budget', () => {
      const error = new TimeoutError('Request timed out after 50ms', 50);
      expect(error.name).toBe('TimeoutError');
      expect(error.timeoutMs).toBe(50);
      expect(error.metadata).toEqual({ timeoutMs: 50 });
    });
  });

  describe('CancellationError', () => {
    it('should have a default message', () => {
      const error = new CancellationError();
      expect(error.name).toBe('CancellationError');
      expect(error.message).toBe('Request was cancelled.');
    });
  });

  it('should name ConfigurationError and StorageError', () => {
    expect(new ConfigurationError('x').name).toBe('ConfigurationError');
    expect(new StorageError('x').name).toBe('StorageError');
  });
});
