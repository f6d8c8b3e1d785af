export { createStrataMcpServer, toMcpTools, SERVER_NAME, SERVER_VERSION } from './server.js';
export { createStdioTransport } from './stdio.js';
export { serveStdio } from './run.js';
