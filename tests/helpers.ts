import type { Router } from 'express';
import { Database, IN_MEMORY } from '../src/backend/storage';
import { createServices } from '../src/backend/server';

type RouteHandler = (req: unknown, res: unknown, next: () => void) => unknown;

type RouteLayer = {
  route?: {
    path: string;
    methods: Record<string, boolean | undefined>;
    stack: Array<{ handle: RouteHandler }>;
  };
};

type InvokeArgs = {
  body?: unknown;
  query?: Record<string, unknown>;
  params?: Record<string, string>;
};

export type InvokeResult = {
  status: number;
  body: unknown;
  contentType?: string;
  attachment?: string;
};

export function openTestDatabase() {
  return new Database({ filePath: IN_MEMORY });
}

export function createTestServices(clock?: () => Date) {
  const database = openTestDatabase();
  return { database, ...createServices(database, clock) };
}

function getRouteHandler(router: Router, method: string, routePath: string): RouteHandler {
  const stack = (router as unknown as { stack?: RouteLayer[] }).stack ?? [];
  const layer = stack.find((entry) => entry.route?.path === routePath && entry.route.methods[method.toLowerCase()]);
  const handlers = layer?.route?.stack ?? [];
  const last = handlers[handlers.length - 1];
  if (!last) {
    throw new Error(`Route not found: ${method.toUpperCase()} ${routePath}`);
  }
  return last.handle;
}

// Calls the final handler of a route directly; body parsers are skipped, so pass the parsed body.
export async function invokeRoute(router: Router, method: string, routePath: string, args: InvokeArgs = {}): Promise<InvokeResult> {
  const handler = getRouteHandler(router, method, routePath);
  const result: InvokeResult = { status: 200, body: undefined };

  const res = {
    status(code: number) {
      result.status = code;
      return this;
    },
    json(value: unknown) {
      result.body = value;
      return this;
    },
    type(value: string) {
      result.contentType = value;
      return this;
    },
    attachment(fileName: string) {
      result.attachment = fileName;
      return this;
    },
    send(value: unknown) {
      result.body = value;
      return this;
    }
  };

  const req = {
    body: args.body,
    query: args.query ?? {},
    params: args.params ?? {}
  };

  await handler(req, res, () => undefined);
  return result;
}
