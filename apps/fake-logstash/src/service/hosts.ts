/** Host the local machine reaches the fixture through. */
export const LOCAL_HOST = "localhost";

/**
 * Host a container reaches the machine's services through: Docker Desktop exposes
 * host.docker.internal, Linux engines route the default bridge gateway.
 */
export function defaultContainerHost(platform: NodeJS.Platform = process.platform): string {
  if (platform === "darwin" || platform === "win32") return "host.docker.internal";
  return "172.17.0.1";
}
