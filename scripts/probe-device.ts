/**
 * Probe a KVM device: log in, dump its REST state, then print the event
 * channel's notifications for a few seconds.
 *
 * Usage: KVM_HOST=kvm.local KVM_PASSWORD=... npm run probe
 */

import { AsyncKvmClient } from "../src/client/async-client.js";

const LISTEN_MS = Number(process.env.PROBE_LISTEN_MS) || 5000;

const kvm = new AsyncKvmClient();
console.log(`Device: ${kvm.baseUrl}`);

try {
	const info = await kvm.info();
	console.log("\n/api/info:");
	console.log(JSON.stringify(info, null, 2));

	const streamer = await kvm.streamerInfo();
	console.log("\n/api/streamer:");
	console.log(JSON.stringify(streamer, null, 2));

	console.log("\n/api/atx:");
	console.log(JSON.stringify(await kvm.atx.status(), null, 2));

	console.log("\n/api/msd images:");
	console.log(JSON.stringify(await kvm.msd.listImages(), null, 2));

	const counts = new Map<string, number>();
	kvm.subscribe(({ eventType }) => {
		counts.set(eventType, (counts.get(eventType) ?? 0) + 1);
	});

	await kvm.connect();
	console.log(`\nEvent channel ${kvm.channelState}, listening ${LISTEN_MS}ms...`);
	await new Promise((r) => setTimeout(r, LISTEN_MS));

	console.log("\nNotifications by event_type:");
	for (const [eventType, count] of counts) {
		console.log(`  ${eventType}: ${count}`);
	}

	const jpeg = await kvm.video.screenshot();
	console.log(`\nSnapshot: ${jpeg.length} bytes, magic ${jpeg.subarray(0, 2).toString("hex")}`);
} finally {
	await kvm.close();
}
