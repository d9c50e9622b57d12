import './env';

export default {
  NODE_ENV: process.env.NODE_ENV ?? 'development',
  PORT: Number(process.env.PORT ?? 3000),
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
  // Comma-separated list of allowed origins, e.g.
  // CORS_ALLOWLIST="https://app.example.com,https://admin.example.com"
  CORS_ALLOWLIST: (process.env.CORS_ALLOWLIST ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean),
  RL_POINTS: Number(process.env.RL_POINTS ?? 200),
  RL_DURATION: Number(process.env.RL_DURATION ?? 60),
};
