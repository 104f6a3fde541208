import http from "http";
import { Sentinel } from "../core/sentinel";
import { CredentialVerifier, HostSessionPlatform } from "./host";
import { createHttpServer } from "./http";

export interface StartServerOptions {
  sentinel: Sentinel;
  platform: HostSessionPlatform;
  verifier: CredentialVerifier;
}

export async function startServer({ sentinel, platform, verifier }: StartServerOptions): Promise<http.Server> {
  const app = createHttpServer({ sentinel, platform, verifier });
  const server = http.createServer(app);
  const { logger } = sentinel;
  const port = sentinel.config.port;

  await new Promise<void>((resolve, reject) => {
    const onError = (error: NodeJS.ErrnoException) => {
      if (error.code === "EADDRINUSE") {
        logger.fatal(`Port ${port} is already in use`);
      }
      reject(error);
    };
    server.once("error", onError);
    server.listen(port, () => {
      server.off("error", onError);
      resolve();
    });
  });

  server.on("error", (error: Error) => logger.error(error));
  logger.info(`${sentinel.config.siteName} listening on http://localhost:${port}`, { port });
  return server;
}

export { createHttpServer } from "./http";
export type { HttpServerDeps } from "./http";
export { InMemorySessionPlatform, StaticUserDirectory } from "./host";
export type { CredentialVerifier, HostSessionPlatform, StaticUser, AuthenticatedUser } from "./host";
export { fromExpressRequest } from "./request";
