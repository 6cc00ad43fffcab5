/**
 * Reaching the Argo CD API server. When the configured server is local the
 * API is reached through a port-forward to a ready server pod; the forward is
 * registered in the caller's {@link CleanupScope}.
 */

import { LoggerService } from "@backstage/backend-plugin-api";
import { CleanupScope } from "./cleanup";
import { ClusterClient } from "./ClusterClient";

/** Port the Argo CD server container listens on. */
export const SERVER_POD_PORT = 8080;

const LOCAL_HOSTS = new Set(["localhost", "127.0.0.1", "::1", "[::1]"]);

export interface ControllerAccessOptions {
  cluster: ClusterClient;
  scope: CleanupScope;
  logger: LoggerService;
  namespace: string;
  serverSelector: string;
}

export function serverHost(server: string): string {
  const withoutScheme = server.replace(/^[a-z]+:\/\//i, "");
  const authority = withoutScheme.split("/")[0];
  if (authority.startsWith("[")) {
    return authority.slice(0, authority.indexOf("]") + 1);
  }
  return authority.split(":")[0];
}

export function serverPort(server: string, fallback: number): number {
  const authority = server.replace(/^[a-z]+:\/\//i, "").split("/")[0];
  const match = /:(\d+)$/.exec(authority);
  return match ? Number(match[1]) : fallback;
}

export function isLocalServer(server: string): boolean {
  return LOCAL_HOSTS.has(serverHost(server).toLowerCase());
}

/**
 * Returns the address to use for API calls: the configured server itself, or
 * the local end of a new port-forward.
 */
export async function openControllerChannel(
  server: string,
  options: ControllerAccessOptions,
): Promise<string> {
  if (!isLocalServer(server)) {
    return server;
  }

  const pods = await options.cluster.listPods(
    options.namespace,
    options.serverSelector,
  );
  const pod = pods.find((p) => p.ready);
  if (!pod) {
    throw new Error(
      `No ready Argo CD server pod matches ${options.serverSelector} in ${options.namespace}`,
    );
  }

  const handle = await options.cluster.portForward(
    options.namespace,
    pod.name,
    SERVER_POD_PORT,
    serverPort(server, SERVER_POD_PORT),
  );
  options.scope.register(`port-forward to ${pod.name}`, () => handle.close());
  options.logger.info(
    `Port-forwarding 127.0.0.1:${handle.localPort} to ${options.namespace}/${pod.name}`,
  );
  return `https://127.0.0.1:${handle.localPort}`;
}
