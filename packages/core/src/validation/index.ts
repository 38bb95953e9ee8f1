export { checkModeSchema, timeOfDaySchema } from './schemas.js';
