import { createServer } from 'http';
import { createApp } from './app';
import { loadConfig } from './config/welder.config';

const PORT = process.env.PORT || 3001;

const config = loadConfig();
const app = createApp(config);
const httpServer = createServer(app);

function shutdown(signal: string): void {
  console.log(`${signal} received, closing server...`);
  httpServer.close(() => process.exit(0));
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

// Start server
httpServer.listen(PORT, () => {
  console.log(`⚡️ Server is running on port ${PORT}`);
  console.log(`🔥 Weld G-code API ready at http://localhost:${PORT}/api`);
  console.log(
    `[Config] Bed ${config.printer.bedSizeX} x ${config.printer.bedSizeY}mm, ` +
      `dot spacing ${config.sequence.dotSpacing}mm`
  );
});

export default app;
