import crypto from "node:crypto";
import dgram from "node:dgram";
import os from "node:os";

export interface HostIdentity {
	host: string;
	ipAddress: string;
	macAddress: string;
}

type InterfaceMap = NodeJS.Dict<os.NetworkInterfaceInfo[]>;

const LOOPBACK_IP = "127.0.0.1";
const EMPTY_MAC = "00:00:00:00:00:00";

// Any routable address works; connecting a UDP socket sends nothing
const ROUTE_LOOKUP_HOST = "8.8.8.8";
const ROUTE_LOOKUP_PORT = 80;

function formatMac(octets: readonly number[]): string {
	return octets.map(o => o.toString(16).padStart(2, "0")).join(":").toUpperCase();
}

/**
 * Random MAC with the multicast bit set, so it can never collide with a real NIC.
 */
export function randomMac(): string {
	const bytes = [...crypto.randomBytes(6)];
	bytes[0] |= 0x01;
	return formatMac(bytes);
}

/**
 * Source address the kernel picks for traffic towards `host`, i.e. the
 * address of the outbound route. Resolves undefined when there is no route.
 */
export function outboundAddress(host: string = ROUTE_LOOKUP_HOST, port: number = ROUTE_LOOKUP_PORT): Promise<string | undefined> {
	return new Promise(resolve => {
		const socket = dgram.createSocket("udp4");
		let settled = false;

		const finish = (address: string | undefined) => {
			if (settled) return;
			settled = true;
			socket.close();
			resolve(address);
		};

		socket.once("error", () => finish(undefined));
		socket.connect(port, host, () => finish(socket.address().address));
	});
}

function interfaceOwning(interfaces: InterfaceMap, address: string): os.NetworkInterfaceInfo | undefined {
	for (const entries of Object.values(interfaces)) {
		const owner = (entries ?? []).find(i => i.address === address);
		if (owner) return owner;
	}
	return undefined;
}

/**
 * Build the identity from the outbound address: the MAC is the one of the
 * interface holding that address. Without a route the address is loopback,
 * and without a usable MAC a random one is used.
 * The MAC doubles as the MQTT client id.
 */
export function resolveIdentity(
	outboundIp: string | undefined,
	interfaces: InterfaceMap = os.networkInterfaces(),
	hostname: string = os.hostname()
): HostIdentity {
	const ipAddress = outboundIp ?? LOOPBACK_IP;
	const owner = interfaceOwning(interfaces, ipAddress);
	const macAddress = owner && !owner.internal && owner.mac !== EMPTY_MAC ? owner.mac.toUpperCase() : randomMac();

	return { host: hostname, ipAddress, macAddress };
}

/** Resolve hostname, outbound IPv4 address and MAC once at startup. */
export async function detectIdentity(): Promise<HostIdentity> {
	return resolveIdentity(await outboundAddress());
}
