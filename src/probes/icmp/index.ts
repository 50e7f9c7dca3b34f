export { IcmpProbe, createIcmpProbe, type ContinuousPingOptions, type DefaultIcmpProbeOptions } from './icmp-probe.js';
export { SystemPing, spawnCommand, pingArguments, type CommandRunner, type CommandOutcome, type SystemPingOptions } from './system-ping.js';
export { RawSocketPing, type IcmpSocket, type IcmpSocketFactory, type RawSocketPingOptions } from './raw-socket-ping.js';
export { buildEchoRequest, isEchoReply, icmpChecksum, ECHO_PAYLOAD } from './icmp-packet.js';
export { parsePingRtt } from './ping-output.js';
