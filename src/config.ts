import dotenv from 'dotenv';

dotenv.config();

export const config = {
  port: Number(process.env.PORT || 3001),
  nodeEnv: process.env.NODE_ENV,
  corsOrigins: (process.env.CORS_ORIGIN || 'http://localhost:5173,http://localhost:5174')
    .split(',')
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0),
  maxFileSize: parseInt(process.env.MAX_FILE_SIZE || '10485760', 10),
  jsonBodyLimit: process.env.JSON_BODY_LIMIT || '1mb'
};
