import fastify, { type FastifyError } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import fastifyHelmet from '@fastify/helmet';

import config from './config';
import gasConfig from './config/gas';
import { Logger } from './utils/logger';
import { GasPriceService } from './services/GasPriceService';
import { RouteRegistry } from './routes/registry';
import {
  initializeEthereumRpcProvider,
  shutdownEthereumRpcProvider,
} from './providers/ethereumRpcProvider';

const logger = new Logger('App');
const app = fastify({
  logger: {
    level: config.LOG_LEVEL,
    // Redact common secret locations from logs
    redact: {
      paths: ['req.headers.authorization', 'req.headers.cookie', 'headers["x-api-key"]'],
      remove: true,
    },
  },
  bodyLimit: 64 * 1024,
  maxParamLength: 1024,
});

// ---- Security headers (Helmet) ----------------------------------------------
app.register(fastifyHelmet, {
  contentSecurityPolicy: false,
  crossOriginOpenerPolicy: { policy: 'same-origin' },
  crossOriginResourcePolicy: { policy: 'same-origin' },
  referrerPolicy: { policy: 'no-referrer' },
  hidePoweredBy: true,
});

// ---- Global Rate Limiting ------------------------------------------------
app.register(rateLimit, {
  max: config.RL_POINTS,
  timeWindow: `${config.RL_DURATION} seconds`,
  errorResponseBuilder: (request, context) => ({
    statusCode: 429,
    error: 'Too Many Requests - Global rate limit exceeded',
    requestId: request.id,
    retryAfter: Math.round(context.ttl / 1000),
  }),
});

// ---- CORS (lock to your frontends) ------------------------------------------
app.register(cors, {
  origin: (origin, cb) => {
    // Allow non-browser clients (no Origin header), and allowed origins
    if (!origin) return cb(null, true);
    if (config.CORS_ALLOWLIST.includes(origin)) return cb(null, true);
    return cb(new Error('CORS: origin not allowed'), false);
  },
  methods: ['GET', 'POST', 'OPTIONS'],
  credentials: false,
});

// ---- Global error handler (no leaky details) --------------------------------
app.setErrorHandler((err: FastifyError, req, reply) => {
  const status =
    typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 600
      ? err.statusCode
      : 500;

  const isValidation = Boolean(err.validation) || err.code === 'FST_ERR_VALIDATION';

  // Log full error server-side, but return a generic message to clients
  req.log.error({ err, requestId: req.id }, 'request_error');

  const message =
    isValidation ? 'Invalid request' :
    status >= 500 ? 'Internal Server Error' :
    'Bad Request';

  reply
    .code(isValidation && status === 500 ? 400 : status)
    .type('application/json')
    .send({ error: message, requestId: req.id });
});

const shutdown = async () => {
  await app.close();
  shutdownEthereumRpcProvider();
  process.exit(0);
};

process.on('SIGINT', () => {
  shutdown().catch((err: unknown) => {
    logger.error('Error during shutdown', { error: err });
    process.exit(1);
  });
});

const start = async () => {
  try {
    const provider = gasConfig.sources.includes('node')
      ? initializeEthereumRpcProvider(gasConfig.node)
      : undefined;
    const gasPriceService = GasPriceService.fromConfig(gasConfig, { provider });

    const routeRegistry = new RouteRegistry(app, { gasPriceService });
    await routeRegistry.registerAllRoutes();

    await app.listen({ port: config.PORT, host: '0.0.0.0' });
    logger.info(`Server listening on port ${config.PORT} (env=${config.NODE_ENV})`, {
      sources: gasPriceService.sourceNames,
      budgetPolicy: gasConfig.budgetPolicy,
    });
  } catch (err) {
    logger.error('Error starting server', { error: err });
    process.exit(1);
  }
};

void start();
