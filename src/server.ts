import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { createHttpApp } from './infrastructure/http/createHttpApp.js';

const container = new AppContainer();
const app = createHttpApp(container);
const { port, name } = container.config.app;

app.listen(port, () => {
  console.log(`🚀 ${name} listening on port ${port}`);
  console.log(`📊 Environment: ${process.env.NODE_ENV || 'development'}`);
  console.log(`🤖 Default LLM provider: ${container.config.extraction.defaultProvider}`);
});
