import { startServer } from './api/server.js';
import { loadConfig, loadEnvFiles } from './config/env.js';

loadEnvFiles();

console.log(`
╔════════════════════════════════════════════════════════════════╗
║     Utah Disclosure Tracker                                    ║
║     Campaign finance and lobbyist disclosures                  ║
╚════════════════════════════════════════════════════════════════╝
`);

startServer(loadConfig()).catch(error => {
  console.error(error);
  process.exitCode = 1;
});
