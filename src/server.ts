import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { API_NAME, createApp } from './infrastructure/http/createApp.js';

const container = await AppContainer.create();
const app = createApp(container);
const port = container.config.server.port;

app.listen(port, () => {
  console.log(`🚀 ${API_NAME} listening on port ${port}`);
  console.log(`📊 Environment: ${process.env.NODE_ENV || 'development'}`);
  console.log(`🗓️ Windows: ${container.config.pipeline.timeWindows.join(', ')}`);
});
