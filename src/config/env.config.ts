import 'dotenv/config';
import { z } from 'zod';

const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const toNumber = (fallback: number) =>
  z.preprocess((v) => (v === undefined || v === '' ? fallback : Number(v)), z.number());

const toBool = (fallback: boolean) =>
  z.preprocess((v) => {
    if (v === undefined || v === '') return fallback;
    if (typeof v === 'boolean') return v;
    const s = String(v).toLowerCase().trim();
    return ['1', 'true', 'yes', 'y', 'on'].includes(s);
  }, z.boolean());

const optionalString = () =>
  z.preprocess((v) => (v === '' ? undefined : v), z.string().optional());

export const ConfigSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: toNumber(3000),
  LOG_LEVEL: LogLevel.default('info'),

  DATABASE_URL: optionalString(),
  DB_POOL_MAX: toNumber(10),

  TIMEZONE: z.string().default('UTC'),
  OPENING_HOURS: z
    .string()
    .regex(/^\d{2}:\d{2}-\d{2}:\d{2}$/, 'OPENING_HOURS must look like HH:mm-HH:mm')
    .default('09:00-17:00'),
  MIN_LEAD_MINUTES: toNumber(120),
  MAX_RESCHEDULES: toNumber(2),
  RESCHEDULE_CUTOFF_MINUTES: toNumber(60),
  CONSULTATION_FEE: toNumber(2000),
  MEDICATION_FEE: toNumber(800),

  REQUESTER_SERVICE_URL: z.string().default('http://patient-service:5000/api/v1/patients'),
  PROVIDER_SERVICE_URL: z.string().default('http://doctor-service:5001/api/v1/doctors'),
  BILLING_SERVICE_URL: z.string().default('http://billing-service:5003/api/v1/bills'),
  PRESCRIPTION_SERVICE_URL: z
    .string()
    .default('http://prescription-service:5004/api/v1/prescriptions'),
  NOTIFICATION_SERVICE_URL: z.string().default('http://notification-service:5005/api/v1/events'),
  EXTERNAL_TIMEOUT_MS: toNumber(5000),
  DIRECTORY_FAIL_OPEN: toBool(false),

  JWT_SECRET: z.string().min(1, 'JWT_SECRET is required'),
  JWT_ALGORITHM: z.enum(['HS256', 'HS384', 'HS512']).default('HS256'),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

function loadEnv(): Readonly<AppConfig> {
  const parsed = ConfigSchema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `- ${i.path.join('.')}: ${i.message}`).join('\n');
    const message = [
      'Invalid environment configuration:',
      issues,
      'Update your .env or environment variables and try again.',
    ].join('\n');
    throw new Error(message);
  }
  return Object.freeze(parsed.data);
}

export const config: Readonly<AppConfig> = loadEnv();
