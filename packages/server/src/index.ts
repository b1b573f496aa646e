import {
  BaseshiftError,
  InvalidBaseError,
  InvalidDigitError,
  InvalidOptionsError,
  MalformedNumberError,
  convertToDigits,
  formatDigits,
  formatString,
} from '@baseshift/core';
import { fileURLToPath } from 'node:url';
import { serve } from '@hono/node-server';
import { zValidator } from '@hono/zod-validator';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { z } from 'zod';

// ============================================================================
// @baseshift/server — HTTP binding for interactive front-ends
// ============================================================================
//
// Stateless: every request is one conversion. A front-end posts the raw text
// and both bases on each keystroke and shows `result` or the error envelope.
// ============================================================================

export const SERVICE_NAME = 'baseshift-api';
export const SERVICE_VERSION = '0.1.0';

export const app = new Hono();

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}

/**
 * Stable error codes for the conversion error kinds.
 */
export function errorCode(err: unknown): string {
  if (err instanceof InvalidBaseError) return 'INVALID_BASE';
  if (err instanceof InvalidDigitError) return 'INVALID_DIGIT';
  if (err instanceof MalformedNumberError) return 'MALFORMED_NUMBER';
  if (err instanceof InvalidOptionsError) return 'INVALID_OPTIONS';
  return 'CONVERSION_ERROR';
}

// --- Middleware ---
app.use(
  '*',
  cors({
    origin: '*',
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type'],
  }),
);

// --- Error handling ---
app.onError((err, c) => {
  console.error(`[${SERVICE_NAME}] ${c.req.method} ${c.req.path}: ${err.message}`);
  return c.json(
    {
      error: {
        code: 'INTERNAL_ERROR',
        message: err.message,
      },
    },
    500,
  );
});

// --- Schemas ---
const digitTokenSchema = z.union([
  z.number().int().min(0),
  z.enum(['.', '[', ']', '-']),
]);

const convertSchema = z.object({
  number: z.union([z.string().max(10_000), z.array(digitTokenSchema).min(1).max(10_000)]),
  inputBase: z.number(),
  outputBase: z.number(),
  maxDepth: z.number().int().min(0).max(100_000).optional(),
  recurring: z.boolean().optional(),
  exact: z.boolean().optional(),
});

// --- Routes ---

app.get('/health', (c) =>
  c.json({
    status: 'ok',
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
  }),
);

app.post('/v1/convert', zValidator('json', convertSchema), (c) => {
  const { number, inputBase, outputBase, maxDepth, recurring, exact } = c.req.valid('json');
  try {
    const output = convertToDigits(number, inputBase, outputBase, { maxDepth, recurring, exact });
    const format = { recurring: recurring ?? true };

    return c.json({
      result: formatString(output, format),
      digits: formatDigits(output, format),
      truncated: output.truncated,
    });
  } catch (err: unknown) {
    if (!(err instanceof BaseshiftError)) throw err;
    return c.json(
      {
        error: { code: errorCode(err), message: errorMessage(err) },
      },
      422,
    );
  }
});

// --- Start ---
export function startServer(port = Number(process.env.PORT ?? 3000)) {
  console.log(`[${SERVICE_NAME}] Server starting on port ${port}`);
  serve({
    fetch: app.fetch,
    port,
  });

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

function shutdown() {
  console.log(`[${SERVICE_NAME}] Shutting down...`);
  process.exit(0);
}

const isDirectExecution = process.argv[1]
  ? fileURLToPath(import.meta.url) === process.argv[1]
  : false;

if (isDirectExecution) {
  startServer();
}
