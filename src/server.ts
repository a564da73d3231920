import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { createApp } from './infrastructure/http/createApp.js';

const container = new AppContainer();
const app = createApp(container);
const { port } = container.config.server;

app.listen(port, () => {
  console.log(`🚀 Debt Question API listening on port ${port}`);
  console.log(`📊 Environment: ${process.env.NODE_ENV || 'development'}`);
  console.log(`🤖 Language models: ${container.configuredProviders().join(', ') || 'none'}`);
});
