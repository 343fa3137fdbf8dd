import { config } from './config';
import { createApp } from './app';

const app = createApp();

console.log('Allowed CORS origins:', config.corsOrigins);

app.listen(config.port, () => {
  console.log(`Server running on port ${config.port}`);
  console.log(`Environment: ${config.nodeEnv}`);
});
