/**
 * Local address shown on the display so the web UI can be found.
 */
import { type NetworkInterfaceInfo, networkInterfaces } from "node:os";

type InterfaceMap = NodeJS.Dict<ReadonlyArray<NetworkInterfaceInfo>>;

/**
 * First non-internal IPv4 address, or 127.0.0.1.
 */
export function getLocalIpAddress(interfaces: InterfaceMap = networkInterfaces()): string {
  for (const addresses of Object.values(interfaces)) {
    const external = addresses?.find(
      (address) => address.family === "IPv4" && !address.internal,
    );
    if (external) return external.address;
  }
  return "127.0.0.1";
}

export const webInterfaceUrl = (address: string, port: number): string =>
  `http://${address}:${port}`;
