import http from "http";
import { NetworkError, describeThrown } from "../core/errors";
import type { ForgeLogger } from "../core/logger";
import { createPeerApp } from "./http";
import type { PeerMessageHandlers } from "./routes/message";

export interface PeerServerOptions {
  handlers: PeerMessageHandlers;
  host: string;
  /** 0 picks a free port */
  port: number;
  logger?: ForgeLogger;
}

export interface PeerServerHandle {
  host: string;
  port: number;
  url: string;
  close(): Promise<void>;
}

/**
 * Start the peer gateway. Resolves once the socket is listening.
 * @throws NetworkError when the address cannot be bound
 */
export async function startPeerServer(options: PeerServerOptions): Promise<PeerServerHandle> {
  const app = createPeerApp({ handlers: options.handlers, logger: options.logger });
  const server = http.createServer(app);

  await new Promise<void>((resolve, reject) => {
    const onError = (error: unknown) => {
      const { code, message } = describeThrown(error);
      reject(
        new NetworkError(
          code === "EADDRINUSE"
            ? `port ${options.port} on ${options.host} is already in use`
            : `cannot listen on ${options.host}:${options.port}: ${message}`
        )
      );
    };
    server.once("error", onError);
    server.listen(options.port, options.host, () => {
      server.off("error", onError);
      resolve();
    });
  });

  const address = server.address();
  const port = address !== null && typeof address === "object" ? address.port : options.port;
  const url = `http://${options.host}:${port}`;
  options.logger?.info("Peer gateway listening", { url });

  server.on("error", (error: unknown) => {
    options.logger?.error(`Peer gateway error: ${describeThrown(error).message}`);
  });

  return {
    host: options.host,
    port,
    url,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

export { createPeerApp } from "./http";
export type { PeerAppDeps } from "./http";
export type { PeerMessageHandlers } from "./routes/message";
