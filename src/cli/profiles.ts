/**
 * Print the voice profile table and its validation issues.
 *
 * Usage: npx tsx src/cli/profiles.ts [--table <voice-profiles.json>] [--json]
 */
import { resolve } from 'node:path';
import { loadConfig } from '../config.js';
import { loadProfileTable } from '../profile/table.js';
import { FORMANT_INDICES, frequencyField } from '../types/formant.js';
import { parseArgs } from './args.js';

function main() {
  const args = parseArgs(process.argv.slice(2), ['table']);
  const path = resolve(args.flags.get('table') ?? loadConfig().profileTablePath);
  const table = loadProfileTable(path);

  if (args.switches.has('json')) {
    console.log(JSON.stringify({ version: table.version, profiles: [...table.profiles.values()], issues: table.issues }, null, 2));
    return;
  }

  console.log(`${path} (v${table.version})`);
  for (const p of table.profiles.values()) {
    const c = p.canonical;
    const freqs = FORMANT_INDICES.map((i) => {
      const field = frequencyField(i);
      const r = p.ranges[field];
      return `${field} ${c[field]}${r ? ` [${r.min}-${r.max}]` : ''}`;
    });
    console.log(`\n${p.name}${p.description ? `: ${p.description}` : ''}`);
    console.log(`  ${freqs.join('  ')}`);
    console.log(`  L ${c.L1}/${c.L2}/${c.L3}/${c.L4}   R ${c.R1}/${c.R2}/${c.R3}/${c.R4}`);
  }

  console.log(table.issues.length === 0 ? '\nNo issues.' : `\n${table.issues.length} issue(s):`);
  for (const issue of table.issues) console.log(`  - ${issue.message}`);
  if (table.issues.length > 0) process.exitCode = 2;
}

main();
