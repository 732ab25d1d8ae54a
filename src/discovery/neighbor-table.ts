/** Six hex byte pairs separated by ':' or '-'. */
export const MAC_PATTERN = /^([0-9A-Fa-f]{2}[:-]){5}[0-9A-Fa-f]{2}$/;

export function isHardwareAddress(value: string): boolean {
  return MAC_PATTERN.test(value);
}

/**
 * Pull the hardware address for `address` out of `arp -a` output.
 *
 * Handles the Windows layout ("  10.0.0.42   aa-bb-cc-dd-ee-ff   dynamic")
 * and the BSD/Linux one ("? (10.0.0.42) at aa:bb:cc:dd:ee:ff [ether] on eth0").
 * Only lines naming the address as a whole token count, so 10.0.0.4 never
 * matches an entry for 10.0.0.42.
 */
export function parseHardwareAddress(output: string, address: string): string | undefined {
  for (const line of output.split(/\r?\n/)) {
    const tokens = line.trim().split(/\s+/);
    const namesAddress = tokens.some((token) => token === address || token === `(${address})`);
    if (!namesAddress) {
      continue;
    }
    const mac = tokens.find(isHardwareAddress);
    if (mac) {
      return mac.toUpperCase();
    }
  }
  return undefined;
}
