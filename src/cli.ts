import { readFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import {
    type AnnealProgress,
    type AnnealerResult,
    type LayoutScore,
    type RankedLayout,
    refineStartLayout,
    runAnnealer,
    runAnnealingChains,
    scoreStartLayout,
} from './optimizer';
import { isRecord, normalizeAnnealerConfig, resolveAlphabet } from './config';
import { buildCorpusStats } from './corpus';
import { layoutToAssignment } from './layout';
import { deriveChainSeeds } from './random';
import { formatCostSummary, renderLayout } from './renderer';
import { ConfigurationError, LayoutValidationError } from './errors';

const USAGE = `Usage: swipe9 <optimize|score|refine> <corpus> [options]

Commands:
  optimize   anneal from the start layout
  score      print the cost of the start layout
  refine     apply the best single swap until none improves the start layout

Options:
  --config <file>      JSON options; flags override them
  --layout <file>      JSON start layout mapping characters to slots
  --seed <n>           random seed
  --iterations <n>     iteration budget per chain
  --chains <n>         independent chains, best one wins (default: 1)
  --top <n>            print the n best distinct layouts found (default: 1)
  --alphabet <value>   letters | letters+symbols | explicit characters
  --center-tap-only    no swipes on the center key
  --random-start       start from a shuffled layout
  --progress           print a line per temperature step
  --json               print the best layout as JSON
  -h, --help           show this message`;

type Command = 'optimize' | 'score' | 'refine';

function isCommand(value: string | undefined): value is Command {
    return value === 'optimize' || value === 'score' || value === 'refine';
}

function parseIntegerOption(name: string, value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new ConfigurationError(`--${name} expects an integer, got "${value}"`);
    }
    return parsed;
}

async function readJson(path: string): Promise<unknown> {
    const text = await readFile(path, 'utf8');
    try {
        return JSON.parse(text);
    } catch (error) {
        throw new ConfigurationError(`${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
}

function logProgress(progress: AnnealProgress): void {
    console.log(
        [
            `iter=${progress.iteration}`,
            `temp=${progress.temperature.toExponential(3)}`,
            `current=${progress.currentCost.toFixed(5)}`,
            `best=${progress.bestCost.toFixed(5)}`,
        ].join(' | '),
    );
}

function describeRun(result: AnnealerResult): string {
    const operators = result.operators
        .map((op) => `${op.id} ${op.accepted}/${op.attempts} (improved ${op.improved})`)
        .join(', ');
    return [
        `seed=${result.seed}`,
        `score ${result.startCost.toFixed(5)} -> ${result.breakdown.total.toFixed(5)}`,
        `iter=${result.iterations}`,
        `accepted=${result.acceptedMoves}`,
        operators,
    ].join(' | ');
}

async function main(argv: string[]): Promise<number> {
    const { values, positionals } = parseArgs({
        args: argv,
        allowPositionals: true,
        options: {
            config: { type: 'string' },
            layout: { type: 'string' },
            seed: { type: 'string' },
            iterations: { type: 'string' },
            chains: { type: 'string' },
            top: { type: 'string' },
            alphabet: { type: 'string' },
            'center-tap-only': { type: 'boolean' },
            'random-start': { type: 'boolean' },
            progress: { type: 'boolean' },
            json: { type: 'boolean' },
            help: { type: 'boolean', short: 'h' },
        },
    });

    const [command, corpusPath] = positionals;
    if (values.help || !isCommand(command) || corpusPath === undefined) {
        console.log(USAGE);
        return values.help ? 0 : 1;
    }

    const fileConfig = values.config === undefined ? {} : await readJson(values.config);
    if (!isRecord(fileConfig)) throw new ConfigurationError(`${values.config} must contain a JSON object`);

    const config: Record<string, unknown> = { ...fileConfig };
    if (values.layout !== undefined) config.startLayout = await readJson(values.layout);
    if (values.alphabet !== undefined) config.alphabet = values.alphabet;
    if (values['center-tap-only']) config.centerKeySwipes = false;
    if (values['random-start']) config.start = 'random';
    const seed = parseIntegerOption('seed', values.seed);
    if (seed !== undefined) config.seed = seed;
    const iterations = parseIntegerOption('iterations', values.iterations);
    if (iterations !== undefined) config.maxIterations = iterations;
    const top = parseIntegerOption('top', values.top);
    if (top !== undefined) config.topCount = top;
    const chains = parseIntegerOption('chains', values.chains) ?? 1;
    if (chains < 1) throw new ConfigurationError('--chains must be at least 1');

    const text = await readFile(corpusPath, 'utf8');
    const stats = buildCorpusStats(text, resolveAlphabet(config.alphabet));
    const onProgress = values.progress ? logProgress : undefined;

    let layoutScore: LayoutScore;
    let ranked: RankedLayout[] = [];
    if (command === 'score') {
        layoutScore = scoreStartLayout(stats, config);
        console.log(values.layout === undefined ? 'Reference layout' : 'Start layout');
    } else if (command === 'refine') {
        const result = refineStartLayout(stats, config);
        console.log(`score ${result.startCost.toFixed(5)} -> ${result.breakdown.total.toFixed(5)} | swaps=${result.swaps}`);
        layoutScore = result;
    } else if (chains === 1) {
        const result = runAnnealer(stats, config, { onProgress });
        console.log(describeRun(result));
        layoutScore = result;
        ranked = result.top;
    } else {
        const seeds = deriveChainSeeds(normalizeAnnealerConfig(config).seed, chains);
        const { best, chains: results, top: merged } = runAnnealingChains(stats, config, seeds, { onProgress });
        results.forEach((result, i) => console.log(`chain ${i}: ${describeRun(result)}`));
        console.log(`best chain: seed=${best.seed}`);
        layoutScore = best;
        ranked = merged;
    }

    console.log(renderLayout(layoutScore.layout));
    console.log(formatCostSummary(layoutScore.breakdown));
    ranked.slice(1).forEach((entry, i) => {
        console.log(`\n#${i + 2} total: ${entry.total.toFixed(4)}`);
        console.log(renderLayout(entry.layout));
    });
    if (values.json) console.log(JSON.stringify(layoutToAssignment(layoutScore.layout), null, 2));
    return 0;
}

main(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        if (error instanceof ConfigurationError || error instanceof LayoutValidationError) {
            console.error(`${error.name}: ${error.message}`);
        } else {
            console.error(error);
        }
        process.exitCode = 1;
    });
