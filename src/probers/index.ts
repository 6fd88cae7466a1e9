export { SystemPingProber, parsePingOutput, buildPingArgs, type SystemPingProberOptions } from './system-ping.prober.js';
