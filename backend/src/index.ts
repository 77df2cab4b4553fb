/**
 * Express backend server for STL surface metadata
 */

import { createApp } from './app';
import { loadConfig } from './config';

const config = loadConfig();
const app = createApp(config);

// Start server
app.listen(config.port, () => {
  console.log(`Server is running on http://localhost:${config.port}`);
});
