process.env.NODE_ENV = 'test';
process.env.APP_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.STORE_DRIVER = 'memory';
