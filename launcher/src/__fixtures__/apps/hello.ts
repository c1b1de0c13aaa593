import type { IncomingMessage, ServerResponse } from "http";

export function app(req: IncomingMessage, res: ServerResponse) {
  res.setHeader("content-type", "text/plain");
  res.end(`hello from ${process.pid} at ${req.url ?? "/"}`);
}

export const settings = { title: "hello" };

export const api = { handler: app };
