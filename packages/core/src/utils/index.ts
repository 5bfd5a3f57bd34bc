export { createLogger } from './logger';
export type { Logger } from './logger';
export { calculateScale, lineLength } from './scale';
