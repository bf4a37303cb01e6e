export { authUrlCommand, loginCommand, revokeCommand } from './auth.js';
export { downloadCommand } from './download.js';
export { uploadCommand } from './upload.js';
