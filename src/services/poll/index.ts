export { PollLoop, type PollLoopOptions, type CycleOutcome, type DocumentTarget } from './loop.js';
export { fingerprintTrack, NO_TRACK_FINGERPRINT, type Fingerprint } from './fingerprint.js';
