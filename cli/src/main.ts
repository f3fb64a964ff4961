#!/usr/bin/env node
import { parseArgs, usage } from './args';
import { generateAll } from './generate';
import { andThen } from '../../shared/utils/result';

function main([_node, _script, ...args]: string[]) {
  if (args.includes('--help') || args.includes('-h')) {
    console.log(usage());
    return;
  }

  const result = andThen(parseArgs(args), (options) =>
    generateAll(options, ({ path, vertexCount, faceCount }) => {
      console.log(`Wrote ${path} (${vertexCount} vertices, ${faceCount} faces)`);
    })
  );

  if (!result.ok) {
    console.error(`Error: ${result.error.message}`);
    if (result.error.code === 'PARAMETER_VALIDATION' && result.error.path?.startsWith('--')) {
      console.error(usage());
    }
    process.exit(1);
  }
}

main(process.argv);
