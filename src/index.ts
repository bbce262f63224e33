import { config } from './config.js';
import { createApp } from './app.js';

// Log configuration only in development
if (config.env !== 'production') {
  console.log('Division config:', config.divisions);
}

const app = createApp(config);

app.listen(config.port, '0.0.0.0', () => {
  console.log(`🚀 Search division service running on http://localhost:${config.port}`);
  console.log(`📊 Health check: http://localhost:${config.port}/health`);
  console.log(`🗺️  API: http://localhost:${config.port}/api/divisions/generate`);
});
