import morgan, { StreamOptions } from 'morgan';
import { Logging } from '../utils';
import { env } from '../config';

// Access lines go to winston at the http level
const stream: StreamOptions = {
  write: (message: string) => {
    Logging.http(message.trim());
  },
};

// Skipped under test and for liveness checks
const skip = (req: { url?: string }): boolean => {
  return env.NODE_ENV === 'test' || (req.url ?? '').endsWith('/health/live');
};

export const requestLogger = morgan(
  env.NODE_ENV === 'production' ? 'combined' : 'dev',
  { stream, skip }
);

export default requestLogger;
