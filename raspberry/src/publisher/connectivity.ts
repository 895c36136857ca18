import os from "node:os";
import type { NetworkInterfaceInfo } from "node:os";

/**
 * Answers "is outbound network currently usable". Checked before every publish.
 */
export type ConnectivityGate = () => boolean;

export type InterfaceLister = () => NodeJS.Dict<NetworkInterfaceInfo[]>;

export interface InterfaceGateOptions {
	// Only consider these interfaces (e.g. ["wlan0", "eth0"]); all when omitted
	interfaces?: string[];
	listInterfaces?: InterfaceLister;
}

/**
 * Network is usable when at least one non-loopback interface has an address.
 */
export function createInterfaceConnectivityGate(opts: InterfaceGateOptions = {}): ConnectivityGate {
	const listInterfaces = opts.listInterfaces ?? os.networkInterfaces;
	const wanted = opts.interfaces && opts.interfaces.length > 0 ? new Set(opts.interfaces) : null;

	return () => {
		const all = listInterfaces();
		for (const [name, addrs] of Object.entries(all)) {
			if (wanted && !wanted.has(name)) continue;
			if (addrs?.some(a => !a.internal)) return true;
		}
		return false;
	};
}
