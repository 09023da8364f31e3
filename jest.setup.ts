// Keep pino quiet while tests run
process.env.LOG_LEVEL = 'silent';
