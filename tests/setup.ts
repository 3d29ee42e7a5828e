// Keep test output to errors only; nothing is written to disk.
import { initLogger } from '../services/p2p-relay/src/core/logger.js';

initLogger({
  level: 'error',
  dir: 'logs',
  to_file: false,
  rotation: { max_size_mb: 10, max_files: 5 },
});
