/**
 * Load Settings — environment config plus a validated JSON file, with every
 * failure reported as a value.
 *
 * Run: STEPWISE_LOG_LEVEL=debug npx tsx examples/load-settings.ts settings.json
 */

import { anyError, describeError, loadConfig, readJsonFile, take, z } from "../src/index.js";

const settingsSchema = z.object({
	service: z.string().min(1),
	port: z.number().int().min(1).max(65_535),
	features: z.array(z.string()),
});

const config = loadConfig();
if (!config.ok) {
	console.error(describeError(config.error));
	process.exit(1);
}

const settings = await readJsonFile(process.argv[2] ?? "settings.json", settingsSchema);

const summary = anyError(
	function* () {
		const loaded = yield* take(settings);
		if (loaded.port < 1024) {
			yield new Error(`port ${loaded.port} needs elevated privileges`);
		}
		return `${loaded.service} on :${loaded.port} (${loaded.features.length} features)`;
	},
	{ ...config.value, name: "load-settings" },
);

if (summary.ok) {
	console.log(summary.value);
} else {
	console.error(describeError(summary.error));
	process.exitCode = 1;
}
