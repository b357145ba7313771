export { AppConfig } from './env';
