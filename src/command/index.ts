export { authCommand, RawCommand, selectCommand } from './raw-command.js';
