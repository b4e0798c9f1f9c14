export const PACKAGE_NAME = "@metronome/test-utils" as const;

export { FakeClock, settle } from "./fake-clock.js";
export { collect, type ReceiveOutcome, receiveWithin } from "./receive.js";
