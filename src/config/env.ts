import dotenv from 'dotenv';

const ENV_SENTINEL = '__GAS_PRICE_API_ENV_INITIALIZED__';

const loadEnv = () => {
  dotenv.config();
  process.env[ENV_SENTINEL] = 'true';
};

if (!process.env[ENV_SENTINEL]) {
  loadEnv();
}
