import { loadActivities, loadConfig } from "@activity-hub/core";
import { createServer } from "./server.js";

async function main() {
  const config = loadConfig();
  const activities = loadActivities(config.roster.seedFile);

  const server = await createServer({
    activities,
    logging: config.logging,
    recurrenceHorizonDays: config.calendar.recurrenceHorizonDays,
    calendarName: config.calendar.name,
  });

  server.log.info(
    `Loaded ${activities.length} activities from ${config.roster.seedFile}`,
  );

  await server.listen({ port: config.server.port, host: config.server.host });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`\n${signal} received, shutting down gracefully...`);
    try {
      await server.close();
      console.log("Server closed.");
      process.exit(0);
    } catch (err) {
      console.error("Error during shutdown:", err);
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
