/**
 * ruida-udp: Ruida laser controller UDP sender and relay.
 * @module ruida-udp
 */
export * from './protocols';
export * from './cli/options';
