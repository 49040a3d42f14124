export { rawBody } from './raw-body.js';
export { errorMiddleware } from './error.middleware.js';
