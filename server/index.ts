// Main server file
import 'dotenv/config';
import { createServer } from "http";
import { config } from "./config.js";
import { createApp } from "./app.js";
import { FileDataProvider } from "./lib/dataProvider.js";

const provider = new FileDataProvider(config.dataFile, config.dataSheet);

try {
  // Load once up front so a missing or unreadable file shows at startup
  provider.currentTable();
} catch (error) {
  const errorMessage = error instanceof Error ? error.message : String(error);
  console.warn(`⚠️ Could not load '${config.dataFile}', queries will report the error:`, errorMessage);
}

const server = createServer(createApp(provider));
server.listen(config.port, () => {
  console.log(`Server running on port ${config.port}`);
});
