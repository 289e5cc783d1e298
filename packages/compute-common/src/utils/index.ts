export { checkArgument, checkNotNull, checkNotEmpty, checkPositive } from "./preconditions";
export { nameFromSelfLink } from "./self-link";
export { processResourceList, isDeprecated, compareStrings, byName } from "./resource-list";
export { buildLabelsFilterString } from "./labels";
export { mergeMetadataItems } from "./metadata";
export { hasOperationErrors, formatOperationError } from "./operation-error";
export { pollUntil, sleep, monotonicClock } from "./deadline";
export type { Clock, Sleeper, PollOutcome, PollOptions } from "./deadline";
