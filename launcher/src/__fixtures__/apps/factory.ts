import type { IncomingMessage, ServerResponse } from "http";

export async function createApp() {
  await Promise.resolve();
  return (req: IncomingMessage, res: ServerResponse) => {
    res.statusCode = 201;
    res.end("built by factory");
  };
}

export function failingFactory(): never {
  throw new Error("factory exploded");
}
