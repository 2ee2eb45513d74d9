import winston from 'winston';

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    ),
  }),
];

if (process.env.PFL_LOG_FILE) {
  transports.push(new winston.transports.File({ filename: process.env.PFL_LOG_FILE }));
}

const logger = winston.createLogger({
  level: process.env.PFL_LOG_LEVEL || 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports,
});

export default logger;
