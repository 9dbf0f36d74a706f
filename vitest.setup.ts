// The process-wide logger reads LOG_LEVEL when it is first imported
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL ??= 'error';

export {};
