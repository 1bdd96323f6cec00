import pino from 'pino';

// Structured logs go to stderr so stdout carries only progress lines and reports
export const logger = pino(
  {
    level: process.env.LOG_LEVEL || 'info',
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: () => `,"time":"${new Date().toISOString()}"`,
  },
  pino.destination(2)
);

export default logger;
