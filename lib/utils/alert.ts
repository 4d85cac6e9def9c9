import { alertWebhookUrl } from '../config/env.js';

export type AlertSeverity = 'info' | 'warn' | 'error';

export const formatAlertPayload = (context: {
  title: string;
  severity: AlertSeverity;
  message: string;
  meta?: Record<string, unknown>;
}) => ({
  severity: context.severity,
  title: context.title,
  message: context.message,
  meta: context.meta,
  text: `[${context.severity}] ${context.title}: ${context.message}`,
  timestamp: new Date().toISOString(),
});

export async function postAlert(payload: ReturnType<typeof formatAlertPayload>) {
  const url = alertWebhookUrl();
  if (!url) return;
  try {
    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    });
    if (!response.ok) {
      console.warn('[alert] webhook responded', { status: response.status });
    }
  } catch (error) {
    console.error('[alert] webhook failed', error);
  }
}
