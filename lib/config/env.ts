function read(...names: string[]) {
  for (const name of names) {
    const value = process.env[name];
    if (value && value.trim()) return value.trim();
  }
  return '';
}

export function supabaseEnv() {
  return {
    url: read('SUPABASE_URL'),
    serviceRole: read('SUPABASE_SERVICE_ROLE', 'SUPABASE_SERVICE_ROLE_KEY'),
    anonKey: read('SUPABASE_ANON_KEY'),
  };
}

export function instagramEnv() {
  return {
    appId: read('INSTAGRAM_APP_ID', 'META_APP_ID'),
    appSecret: read('INSTAGRAM_APP_SECRET', 'META_APP_SECRET'),
    verifyToken: read('INSTAGRAM_VERIFY_TOKEN', 'META_VERIFY_TOKEN'),
    graphVersion: read('INSTAGRAM_GRAPH_VERSION') || 'v21.0',
  };
}

export function dodoEnv() {
  const environment = read('DODO_ENVIRONMENT') || 'live';
  return {
    apiKey: read('DODO_API_KEY', 'DODO_PAYMENTS_API_KEY'),
    webhookSecret: read('DODO_WEBHOOK_SECRET', 'DODO_PAYMENTS_WEBHOOK_KEY'),
    baseUrl:
      read('DODO_BASE_URL') ||
      (environment === 'test' ? 'https://test.dodopayments.com' : 'https://live.dodopayments.com'),
    products: {
      basic: read('DODO_PRODUCT_BASIC'),
      pro: read('DODO_PRODUCT_PRO'),
      enterprise: read('DODO_PRODUCT_ENTERPRISE'),
    },
  };
}

export function appUrl() {
  return (read('APP_URL', 'VERCEL_PROJECT_PRODUCTION_URL') || 'http://localhost:3000').replace(/\/+$/, '');
}

export function frontendUrl() {
  return (read('FRONTEND_URL') || appUrl()).replace(/\/+$/, '');
}

export function encryptionKey() {
  return read('ENCRYPTION_KEY');
}

export function alertWebhookUrl() {
  return read('ALERT_WEBHOOK_URL');
}

export function opsToken() {
  return read('API_TOKEN');
}

export function reprocessMaxAttempts() {
  const parsed = Number(read('REPROCESS_MAX_ATTEMPTS'));
  return Number.isFinite(parsed) && parsed > 0 ? Math.floor(parsed) : 5;
}

export function trackingSecret() {
  return read('TRACKING_SECRET') || encryptionKey();
}
