import { cfg } from "../config.js";
import { createTransport } from "../transport/index.js";

// usage: node dist/src/tools/seed_discovery.js <repository> [access-hint]
const repo = process.argv[2] || process.env.SEED_REPO || "acme/widgets";
const accessHint = process.argv[3] || process.env.SEED_ACCESS || "";

const msg: Record<string, string> = { repo };
if (accessHint) msg.access_hint = accessHint;

const transport = createTransport();
await transport.connect();
const id = await transport.xAdd(cfg.discoveryStream, "*", msg);
console.log("Seeded", id, "->", msg);
await transport.disconnect();
process.exit(0);
