export { createApiRouter, type ApiRouterDeps } from './routes/index.js';
export { createAppointmentRouter } from './routes/appointment.routes.js';
export { createHealthRouter, type DatabasePing } from './routes/health.routes.js';
