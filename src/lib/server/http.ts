import http from "http";
import type { CatalogStore } from "../catalog";
import { errorMessage } from "../errors";
import { handleRequest } from "./routes";

export interface ServerOptions {
  port: number;
  host: string;
  store: CatalogStore;
}

export async function startServer(options: ServerOptions): Promise<http.Server> {
  const { port, host, store } = options;

  const server = http.createServer((req, res) => {
    const method = req.method ?? "GET";
    const response = handleRequest(method, req.url ?? "/", store);

    response
      .text()
      .then((body) => {
        const headers: Record<string, string> = {};
        response.headers.forEach((value, key) => {
          headers[key] = value;
        });
        res.writeHead(response.status, headers);
        if (method === "HEAD") res.end();
        else res.end(body);
        console.log(`[server] ${method} ${req.url} ${response.status}`);
      })
      .catch((err: unknown) => {
        console.error("[server] Failed to write response:", errorMessage(err));
        if (!res.headersSent) res.writeHead(500);
        res.end();
      });
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const where =
    address && typeof address === "object" ? `${address.address}:${address.port}` : String(address);
  console.log(`[server] Listening on http://${where}`);
  return server;
}

export function stopServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
