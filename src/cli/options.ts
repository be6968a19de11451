/**
 * Command line and environment option parsing for the CLI tools.
 * @module cli/options
 *
 * Arguments take the form `--name=value`; flags are bare `--name`.
 * Command line values override environment values.
 */
import type {RelayAckMode, RuidaRelayConfiguration} from '../protocols/ruida/relay';
import type {RuidaSenderConfiguration} from '../protocols/ruida/sender';
import {RuidaError} from '../protocols/ruida/errors';

export type Environment = Record<string, string | undefined>;

export type SendCliOptions = {
    /** Job file to transmit. */
    file: string;
    verbose: boolean;
    help: boolean;
    sender: RuidaSenderConfiguration;
};

export type RelayCliOptions = {
    verbose: boolean;
    help: boolean;
    relay: RuidaRelayConfiguration;
};

export const SEND_USAGE = [
    'Usage: ruida-send [options] HOST FILE.rd',
    '',
    '  --port=N             controller port (50200)',
    '  --local-port=N       source port (40200, 0 = any)',
    '  --bind=ADDR          local interface address',
    '  --mtu=N              job bytes per datagram (1470)',
    '  --timeout=MS         reply timeout (3000)',
    '  --retry-delay=MS     first backoff delay (200)',
    '  --retry-max-delay=MS backoff ceiling (5000)',
    '  --max-retries=N      give up on the first chunk after N retries',
    '  --chunk-pause=MS     pause before every chunk (0)',
    '  --verbose, -v        log every chunk',
].join('\n');

export const RELAY_USAGE = [
    'Usage: ruida-relay [options] LASER_HOST',
    '',
    '  --laser-port=N       controller port (50200)',
    '  --world-port=N       port senders talk to (50200)',
    '  --device-port=N      laser-facing local port (40200)',
    '  --iface=ADDR         local interface address (0.0.0.0)',
    '  --timeout=MS         stream inactivity timeout (10000)',
    '  --reap-interval=MS   also expire idle streams on a timer (off)',
    '  --capture-dir=DIR    where out_*.rd capture files go (cwd)',
    '  --ack-mode=MODE      local | device (local)',
    '  --verify-checksums   NACK datagrams with a bad checksum',
    '  --verbose, -v        log every datagram',
].join('\n');

const invalid = (message: string): RuidaError => new RuidaError({message, domain: 'config', code: 'INVALID_OPTION'});

const parseInteger = (name: string, raw: string, min: number, max = Number.MAX_SAFE_INTEGER): number => {
    const value = Number(raw);
    if (raw.trim() === '' || !Number.isInteger(value) || value < min || value > max) {
        throw invalid(`${name} must be an integer in ${min}-${max}, got "${raw}"`);
    }
    return value;
};

const parsePort = (name: string, raw: string, allowZero = false): number => parseInteger(name, raw, allowZero ? 0 : 1, 65535);

const parseBoolean = (name: string, raw: string): boolean => {
    const normalized = raw.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off', ''].includes(normalized)) return false;
    throw invalid(`${name} must be a boolean, got "${raw}"`);
};

type SplitArgs = {
    positional: string[];
    named: Map<string, string | true>;
};

const splitArgs = (argv: string[]): SplitArgs => {
    const positional: string[] = [];
    const named = new Map<string, string | true>();
    for (const arg of argv) {
        if (arg === '-v') {
            named.set('verbose', true);
        } else if (arg === '-h') {
            named.set('help', true);
        } else if (arg.startsWith('--')) {
            const eq = arg.indexOf('=');
            if (eq === -1) named.set(arg.substring(2), true);
            else named.set(arg.substring(2, eq), arg.substring(eq + 1));
        } else {
            positional.push(arg);
        }
    }
    return {positional, named};
};

const takeValue = (named: Map<string, string | true>, name: string): string | undefined => {
    const value = named.get(name);
    named.delete(name);
    if (value === true) throw invalid(`--${name} needs a value (--${name}=...)`);
    return value;
};

const takeFlag = (named: Map<string, string | true>, name: string): boolean | undefined => {
    const value = named.get(name);
    named.delete(name);
    if (value === undefined) return undefined;
    return value === true ? true : parseBoolean(`--${name}`, value);
};

const rejectLeftovers = (named: Map<string, string | true>): void => {
    const [unknown] = named.keys();
    if (unknown !== undefined) throw invalid(`Unknown option --${unknown}`);
};

/**
 * Options for `ruida-send`.
 * Environment: `RUIDA_LOCAL_PORT` (or `UDPSENDRUIDA_LOCALPORT`), `RUIDA_MTU`,
 * `RUIDA_TIMEOUT_MS`, `RUIDA_VERBOSE`.
 */
export function parseSendArgs(argv: string[], env: Environment = {}): SendCliOptions {
    const {positional, named} = splitArgs(argv);
    const help = takeFlag(named, 'help') ?? false;
    const verbose = takeFlag(named, 'verbose') ?? parseBoolean('RUIDA_VERBOSE', env.RUIDA_VERBOSE ?? '');

    const port = takeValue(named, 'port');
    const localPort = takeValue(named, 'local-port') ?? env.RUIDA_LOCAL_PORT ?? env.UDPSENDRUIDA_LOCALPORT;
    const bindAddress = takeValue(named, 'bind');
    const mtu = takeValue(named, 'mtu') ?? env.RUIDA_MTU;
    const timeout = takeValue(named, 'timeout') ?? env.RUIDA_TIMEOUT_MS;
    const retryDelay = takeValue(named, 'retry-delay');
    const retryMaxDelay = takeValue(named, 'retry-max-delay');
    const maxRetries = takeValue(named, 'max-retries');
    const chunkPause = takeValue(named, 'chunk-pause');
    rejectLeftovers(named);

    const [host, file] = positional;
    if (help) {
        return {file: file ?? '', verbose, help, sender: {host: host ?? ''}};
    }
    if (!host || !file || positional.length > 2) {
        throw invalid('Expected exactly two arguments: HOST FILE');
    }

    const sender: RuidaSenderConfiguration = {host};
    if (port !== undefined) sender.port = parsePort('--port', port);
    if (localPort !== undefined) sender.localPort = parsePort('--local-port', localPort, true);
    if (bindAddress !== undefined) sender.bindAddress = bindAddress;
    if (mtu !== undefined) sender.mtu = parseInteger('--mtu', mtu, 1, 65507 - 2);
    if (timeout !== undefined) sender.responseTimeoutMs = parseInteger('--timeout', timeout, 1);
    if (retryDelay !== undefined) sender.retryDelayMs = parseInteger('--retry-delay', retryDelay, 0);
    if (retryMaxDelay !== undefined) sender.retryMaxDelayMs = parseInteger('--retry-max-delay', retryMaxDelay, 0);
    if (maxRetries !== undefined) sender.maxFirstChunkRetries = parseInteger('--max-retries', maxRetries, 0);
    if (chunkPause !== undefined) sender.chunkPauseMs = parseInteger('--chunk-pause', chunkPause, 0);
    return {file, verbose, help, sender};
}

/**
 * Options for `ruida-relay`.
 * Environment: `RUIDA_SESSION_TIMEOUT_MS`, `RUIDA_CAPTURE_DIR`, `RUIDA_VERBOSE`.
 */
export function parseRelayArgs(argv: string[], env: Environment = {}): RelayCliOptions {
    const {positional, named} = splitArgs(argv);
    const help = takeFlag(named, 'help') ?? false;
    const verbose = takeFlag(named, 'verbose') ?? parseBoolean('RUIDA_VERBOSE', env.RUIDA_VERBOSE ?? '');

    const laserPort = takeValue(named, 'laser-port');
    const worldPort = takeValue(named, 'world-port');
    const devicePort = takeValue(named, 'device-port');
    const iface = takeValue(named, 'iface');
    const timeout = takeValue(named, 'timeout') ?? env.RUIDA_SESSION_TIMEOUT_MS;
    const reapInterval = takeValue(named, 'reap-interval');
    const captureDir = takeValue(named, 'capture-dir') ?? env.RUIDA_CAPTURE_DIR;
    const ackMode = takeValue(named, 'ack-mode');
    const verifyChecksums = takeFlag(named, 'verify-checksums');
    rejectLeftovers(named);

    const [laserHost] = positional;
    if (help) {
        return {verbose, help, relay: {laserHost: laserHost ?? ''}};
    }
    if (!laserHost || positional.length > 1) {
        throw invalid('Expected exactly one argument: LASER_HOST');
    }

    const relay: RuidaRelayConfiguration = {laserHost};
    if (laserPort !== undefined) relay.laserPort = parsePort('--laser-port', laserPort);
    if (worldPort !== undefined) relay.worldPort = parsePort('--world-port', worldPort);
    if (devicePort !== undefined) relay.devicePort = parsePort('--device-port', devicePort);
    if (iface !== undefined) relay.iface = iface;
    if (timeout !== undefined) relay.sessionTimeoutMs = parseInteger('--timeout', timeout, 0);
    if (reapInterval !== undefined) relay.reapIntervalMs = parseInteger('--reap-interval', reapInterval, 0);
    if (captureDir !== undefined) relay.captureDir = captureDir;
    if (ackMode !== undefined) relay.ackMode = parseAckMode(ackMode);
    if (verifyChecksums !== undefined) relay.verifyChecksums = verifyChecksums;
    return {verbose, help, relay};
}

const parseAckMode = (raw: string): RelayAckMode => {
    if (raw === 'local' || raw === 'device') return raw;
    throw invalid(`--ack-mode must be "local" or "device", got "${raw}"`);
};
