/**
 * Command-line definition
 */
import { Command, Option } from 'commander';
import { VALID_CHANGE_LEVELS } from '../versioning/versioning.types';

export function createProgram(): Command {
  return new Command()
    .name('model-blocks')
    .description('Generate versioned model block YAML files from a model listing API')
    .option('-f, --input-file <file>', 'input JSON file with model records')
    .option('-k, --api-key <key>', 'API key (defaults to TOGETHER_API_KEY)')
    .option('-o, --output-dir <dir>', 'output directory for YAML files (default: ./blocks/public)')
    .option('--skip-free', 'skip free models (models with zero pricing)')
    .option('--summary', 'print summary statistics')
    .option('--force-regenerate', 'rewrite every block, even when nothing changed')
    .addOption(
      new Option('--bump <level>', 'version component bumped for changed models (default: minor)')
        .choices([...VALID_CHANGE_LEVELS]),
    )
    .option('--autocomplete <ids>', 'comma-separated model identifiers that get the autocomplete role')
    .option('--apply-threshold <tokens>', 'minimum context length for the apply role');
}
