import 'dotenv/config';
import { loadConfig } from './config.js';
import { connectToDatabase } from './lib/db.js';
import { createApp } from './app.js';

async function main() {
  const config = loadConfig();
  await connectToDatabase(config);

  const httpServer = createApp(config);

  httpServer.listen(config.port, () => {
    console.log(`🚀 Workout planner API running on http://localhost:${config.port}`);
    console.log(`🔌 WebSocket ready for live workout progress`);
  });
}

main().catch((err) => {
  console.error('❌ Failed to start server:', err);
  process.exit(1);
});
