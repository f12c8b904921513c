import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';
const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

export const logger = pino({
  level,
  transport: pretty ? { target: 'pino-pretty', options: { colorize: true } } : undefined,
});

export const botLogger = logger.child({ module: 'bot' });
export const schedulerLogger = logger.child({ module: 'scheduler' });
export const databaseLogger = logger.child({ module: 'database' });
export const contentLogger = logger.child({ module: 'content' });
export const focusLogger = logger.child({ module: 'focus' });
