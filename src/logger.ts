import { pino } from 'pino';
import config from 'config';

const level = config.has('logging.level') ? config.get<string>('logging.level') : 'info';
const name = config.has('app.name') ? config.get<string>('app.name') : 'FleetTelemetry';

const logger = pino({
  name,
  level
});

export type Logger = Pick<typeof logger, 'info' | 'warn' | 'error' | 'debug'>;

export default logger;
