import fs from 'fs';
import path from 'path';
import specs from '../config/swagger';

// Writes the OpenAPI document for the feed ranking API to the working directory
const outPath = path.resolve(process.cwd(), process.argv[2] ?? 'openapi.json');

fs.writeFileSync(outPath, JSON.stringify(specs, null, 2), 'utf8');
console.log(`Wrote OpenAPI spec to ${outPath}`);
