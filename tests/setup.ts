import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

// Keep lifecycle records out of the real home directory.
const lifecycleDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cloudlab-test-lifecycle-'));
process.env.CLOUDLAB_DASHBOARD_LIFECYCLE_LOG = path.join(lifecycleDir, 'lifecycle.jsonl');
