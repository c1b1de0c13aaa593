import express, { type ErrorRequestHandler } from "express";
import os from "os";
import { INVALID_INPUT_RESPONSE, convert } from "./converter";

export const SERVICE_NAME = "Ultra-Fast Base32 Converter";

export const app = express();

// Generate a unique ID for this instance; every worker loads its own copy
export const instanceId = Math.random().toString(36).slice(2, 8).toUpperCase();
export const startedAt = new Date().toISOString();

app.disable("x-powered-by");
// "/123/" is not "/123"; the not-found handler redirects it instead
app.set("strict routing", true);

app.get("/health", (req, res) => {
  res.json({
    status: "OK",
    service: SERVICE_NAME,
    instanceId,
    pid: process.pid,
    startedAt,
    hostname: os.hostname(),
  });
});

app.get("/:input", (req, res, next) => {
  // an encoded slash makes the decoded path two segments deep
  if (req.params.input.includes("/")) {
    next();
    return;
  }
  res.type("text/plain").send(convert(req.params.input));
});

app.use((req, res) => {
  if (req.method === "GET" && /^\/[^/]+\/$/.test(req.path)) {
    res.redirect(307, `${req.path.slice(0, -1)}${req.url.slice(req.path.length)}`);
    return;
  }
  res.status(404).json({ detail: "Not Found" });
});

const errorHandler: ErrorRequestHandler = (err, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  // express rejects malformed percent-encoding while decoding params
  if (err instanceof URIError) {
    res.type("text/plain").send(INVALID_INPUT_RESPONSE);
    return;
  }

  const message = err instanceof Error ? err.message : String(err);
  res.status(500).type("text/plain").send(`ERROR: ${message}`);
};

app.use(errorHandler);
