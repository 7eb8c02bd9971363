import { startServer } from "./server";
import { getLogger } from "../utils/logger";

// usage: start [path-to-env] [port]
const [configPath, port] = process.argv.slice(2);

startServer({ configPath, port: port ? Number(port) : undefined }).catch((error) => {
    getLogger().error({ err: error }, "Failed to start server.");
    process.exitCode = 1;
});
