// =============================================================================
// Config file discovery paths
// =============================================================================
// Candidate paths probed, in order, when no --config flag is given.

const baseNames = ["pocket-ledger.config", "ledger.config"];

const extensions = [".ts", ".mts", ".js", ".mjs", ".json"];

const directoryPrefixes = ["", "config/"];

export const possibleConfigPaths: string[] = [];

for (const dir of directoryPrefixes) {
	for (const base of baseNames) {
		for (const ext of extensions) {
			possibleConfigPaths.push(`${dir}${base}${ext}`);
		}
	}
}
