import { type CorpusStats, type PreparedCorpus, type WeightedBigram } from './types';

/**
 * Counts characters and adjacent character pairs. A character missing from the
 * alphabet is retried lower-cased; anything still outside it (whitespace,
 * digits) ends the current run, so no bigram spans it.
 */
export function buildCorpusStats(text: string, alphabet: string[]): CorpusStats {
    const known = new Set(alphabet);
    const unigrams: Record<string, number> = {};
    const bigrams: Record<string, number> = {};
    let previous: string | null = null;

    for (const raw of text) {
        const char = known.has(raw) ? raw : raw.toLowerCase();
        if (!known.has(char)) {
            previous = null;
            continue;
        }
        unigrams[char] = (unigrams[char] ?? 0) + 1;
        if (previous !== null) {
            const pair = previous + char;
            bigrams[pair] = (bigrams[pair] ?? 0) + 1;
        }
        previous = char;
    }

    return { unigrams, bigrams };
}

function readCount(table: Record<string, number>, key: string): number {
    const value: unknown = Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) return 0;
    return value;
}

/**
 * Normalizes both tables to probabilities over the alphabet and indexes the
 * bigrams by character. Entries outside the alphabet are ignored; missing,
 * negative or non-finite counts read as zero.
 */
export function prepareCorpus(stats: CorpusStats, alphabet: string[]): PreparedCorpus {
    const index = new Map<string, number>();
    alphabet.forEach((char, i) => index.set(char, i));

    const rawUnigrams = alphabet.map((char) => readCount(stats.unigrams, char));
    const unigramTotal = rawUnigrams.reduce((sum, count) => sum + count, 0);
    const unigrams = rawUnigrams.map((count) => (unigramTotal > 0 ? count / unigramTotal : 0));

    const rawBigrams: WeightedBigram[] = [];
    let bigramTotal = 0;
    for (let from = 0; from < alphabet.length; from++) {
        for (let to = 0; to < alphabet.length; to++) {
            const count = readCount(stats.bigrams, alphabet[from] + alphabet[to]);
            if (count === 0) continue;
            rawBigrams.push({ from, to, weight: count });
            bigramTotal += count;
        }
    }
    const bigrams = rawBigrams.map((bigram) => ({ ...bigram, weight: bigram.weight / bigramTotal }));

    const incident: number[][] = alphabet.map(() => []);
    bigrams.forEach((bigram, i) => {
        incident[bigram.from].push(i);
        if (bigram.to !== bigram.from) incident[bigram.to].push(i);
    });

    return { alphabet: alphabet.slice(), index, unigrams, bigrams, incident };
}
