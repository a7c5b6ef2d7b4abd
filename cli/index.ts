/**
 * lora-audio CLI - simulate, replay and analyse LoRa audio transfers
 */

import { Command, InvalidArgumentError } from 'commander';
import { RADIO_DEFAULTS, LIMITS } from '../src/utils/constants.js';
import { simulateCommand, SIMULATE_DEFAULTS } from './simulate.js';
import { receiveCommand } from './receive.js';
import { airtimeCommand } from './airtime.js';
import { analyzeCommand } from './analyze.js';

// Version injected at build time
declare const __VERSION__: string;
const version = typeof __VERSION__ !== 'undefined' ? __VERSION__ : '0.0.0';

function parseInteger(value: string): number {
  const n = /^0x[0-9a-f]+$/i.test(value) ? parseInt(value.slice(2), 16) : Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return n;
}

function parseNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError('Not a positive number.');
  }
  return n;
}

function parseIntegerList(value: string): number[] {
  return value.split(',').filter(Boolean).map(v => parseInteger(v.trim()));
}

/**
 * Run a command, turning thrown errors into "Error: ..." and exit code 1
 */
function run(fn: () => unknown): void {
  try {
    const result = fn();
    if (typeof result === 'object' && result !== null && 'ok' in result && result.ok === false) {
      process.exitCode = 1;
    }
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

const program = new Command();

program
  .name('lora-audio')
  .description('Fragmented audio transfer over LoRa.\n\nBuilds the START/DATA/END packet sequence for an audio buffer, replays packet captures through a receiver, estimates airtime and analyses receiver logs.')
  .version(version)
  .addHelpText('after', `
Examples:
  $ lora-audio simulate voice.wav -o voice.hex
  $ lora-audio simulate --size 3200 --codec compressed --sf 9
  $ lora-audio receive voice.hex -o received.wav
  $ lora-audio airtime 32000 --compressed 3200
  $ lora-audio analyze rx_log.txt`);

// Simulate command
program
  .command('simulate')
  .description('Build the packet sequence a sender transmits for an audio buffer')
  .argument('[file]', 'WAV or raw audio file (default: generated ramp test buffer)')
  .option('-s, --size <bytes>', `Size of the generated test buffer (default: ${LIMITS.DEFAULT_TEST_BYTES})`, parseInteger)
  .option('-c, --codec <codec>', 'Codec: "raw", or "compressed" to DEFLATE the audio (same as --deflate)', SIMULATE_DEFAULTS.codec)
  .option('-z, --deflate', 'DEFLATE the audio and announce codec "compressed" when smaller')
  .option('--session <id>', 'Session id (default: random)', parseInteger)
  .option('--exp <id>', 'Experiment id', parseInteger)
  .option('--src <id>', 'Source node id', parseInteger)
  .option('--dst <id>', 'Destination node id (255 = broadcast)', parseInteger)
  .option('--sf <sf>', 'Spreading factor', parseInteger, SIMULATE_DEFAULTS.sf)
  .option('--cr <cr>', 'Coding rate denominator (5 = 4/5)', parseInteger, SIMULATE_DEFAULTS.cr)
  .option('--bw <khz>', 'Bandwidth in kHz (airtime estimate only)', parseNumber, SIMULATE_DEFAULTS.bw)
  .option('-p, --power <dbm>', 'TX power in dBm', parseInteger, SIMULATE_DEFAULTS.power)
  .option('--sample-rate <hz>', 'Sample rate to announce (default: from WAV or 16000)', parseInteger)
  .option('--duration <ms>', 'Duration to announce (default: from WAV or 1000)', parseInteger)
  .option('--drop <seqs>', 'Comma-separated fragment numbers to leave out of the capture', parseIntegerList)
  .option('-o, --output <path>', 'Write the packets to a capture file (one hex packet per line)')
  .option('--layout', 'Print an annotated byte dump of the START packet')
  .option('-q, --quiet', 'Suppress progress output')
  .option('--json', 'Output the summary as JSON')
  .action((file: string | undefined, options) => run(() => simulateCommand(file, options)));

// Receive command
program
  .command('receive')
  .description('Replay a packet capture through the receiver and write the reassembled audio')
  .argument('<capture>', 'Capture file written by "simulate -o"')
  .option('-o, --output <path>', 'Write audio here (.wav adds a WAV header)')
  .option('--bits <n>', 'Bits per sample for WAV output', parseInteger, 16)
  .option('--channels <n>', 'Channels for WAV output', parseInteger, 1)
  .option('-q, --quiet', 'Suppress progress output')
  .option('--json', 'Output the result as JSON')
  .action((file: string, options) => run(() => receiveCommand(file, options)));

// Airtime command
program
  .command('airtime')
  .description('Estimate time-on-air and throughput of a transfer')
  .argument('[bytes]', `Audio size in bytes (default: ${LIMITS.DEFAULT_TEST_BYTES})`, parseInteger)
  .option('--sf <list>', 'Comma-separated spreading factors', parseIntegerList, [...LIMITS.DEFAULT_SPREADING_FACTORS])
  .option('--bw <khz>', 'Bandwidth in kHz', parseNumber, RADIO_DEFAULTS.BANDWIDTH_KHZ)
  .option('--cr <cr>', 'Coding rate denominator (5 = 4/5)', parseInteger, RADIO_DEFAULTS.CODING_RATE)
  .option('--compressed <bytes>', 'Compare against a compressed transfer of this size', parseInteger)
  .option('--exact', 'Size the last fragment exactly instead of as a full fragment')
  .option('--json', 'Output as JSON')
  .action((bytes: number | undefined, options) => run(() => airtimeCommand(bytes, options)));

// Analyze command
program
  .command('analyze')
  .description('Reconstruct sessions from a receiver log and report loss and link quality')
  .argument('<log>', 'Receiver log (SESSION_START / RX / SESSION_END lines)')
  .option('-q, --quiet', 'Suppress progress output')
  .option('--json', 'Output as JSON')
  .action((file: string, options) => run(() => analyzeCommand(file, options)));

program.parse();
