import type { Logger } from "../logger.js";
import { errorMessage } from "../errors.js";
import type { EmbyClient, SystemInfo } from "./client.js";

/** Reads `/System/Info` and logs what the server reports. Resolves to undefined when unreachable. */
export async function testConnection(client: EmbyClient, logger: Logger): Promise<SystemInfo | undefined> {
  logger.info(`Testing connection to ${client.serverUrl}`);
  try {
    const info = await client.getSystemInfo();
    logger.info("Successfully connected to Emby server:");
    logger.info(`  Version: ${info.version}`);
    logger.info(`  Server Name: ${info.serverName}`);
    logger.info(`  Operating System: ${info.operatingSystem}`);
    return info;
  } catch (err) {
    logger.error(`Connection test failed: ${errorMessage(err)}`);
    return undefined;
  }
}
