export { HttpTrackerForwarder } from './HttpTrackerForwarder';
export type { HttpTrackerForwarderOptions } from './HttpTrackerForwarder';
