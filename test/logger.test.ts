import { logger } from '../src/utils/logger';

describe('Logger Utility', () => {
  // Mock console output to test logging
  const originalConsoleLog = console.log;
  const originalConsoleError = console.error;
  const mockLog = jest.fn();
  const mockError = jest.fn();

  beforeEach(() => {
    console.log = mockLog;
    console.error = mockError;
    jest.clearAllMocks();
    logger.clearLogs();
  });

  afterEach(() => {
    console.log = originalConsoleLog;
    console.error = originalConsoleError;
  });

  test('should log AI response messages', () => {
    logger.logAIResponse('Test AI response');
    expect(mockLog).toHaveBeenCalledWith('🤖 [AI_RESPONSE] Test AI response', '');
  });

  test('should log vision messages', () => {
    logger.logVision('Classified media', { disease: 'Common Rust' });
    expect(mockLog).toHaveBeenCalledWith('🔍 [VISION] Classified media', { disease: 'Common Rust' });
  });

  test('should log weather messages', () => {
    logger.logWeather('Forecast fetched');
    expect(mockLog).toHaveBeenCalledWith('🌤️ [WEATHER] Forecast fetched', '');
  });

  test('should log routing decisions', () => {
    logger.logRoute('Message m1 -> image path');
    expect(mockLog).toHaveBeenCalledWith('🧭 [ROUTE] Message m1 -> image path', '');
  });

  test('should send error messages to console.error', () => {
    logger.logError('Test error');
    expect(mockError).toHaveBeenCalledWith('❌ [ERROR] Test error', '');
    expect(mockLog).not.toHaveBeenCalled();
  });

  test('should store logs internally', () => {
    logger.logAIResponse('Test message');
    const logs = logger.getLogs();
    expect(logs).toHaveLength(1);
    expect(logs[0].type).toBe('ai_response');
    expect(logs[0].message).toBe('Test message');
  });

  test('should filter logs by type', () => {
    logger.logAIResponse('AI message');
    logger.logError('Error message');
    const errorLogs = logger.getLogs({ type: 'error' });
    expect(errorLogs).toHaveLength(1);
    expect(errorLogs[0].type).toBe('error');
    expect(errorLogs[0].message).toBe('Error message');
  });

  test('should return only the most recent entries when limited', () => {
    logger.logRoute('first');
    logger.logRoute('second');
    logger.logRoute('third');
    expect(logger.getLogs({ limit: 2 }).map(log => log.message)).toEqual(['second', 'third']);
  });
});
