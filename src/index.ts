import 'dotenv/config';
import { bootstrap } from './bootstrap';
import { loadConfig } from './utils/config/config';
import { log } from './utils/log';

const config = loadConfig();
const result = bootstrap(config);

if ('exitCode' in result) {
  process.exit(result.exitCode);
} else {
  // Start server
  result.app.listen(config.port, () => {
    log(`Server is running on port ${config.port}`);
  });
}
