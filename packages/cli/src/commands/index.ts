export type { CommandContext } from "./context";
export { startSpinner } from "./context";
export {
  listRegions,
  listZones,
  listMachineTypes,
  listDiskTypes,
  listImages,
  listNetworks,
  listTemplates,
  listInstances,
} from "./list";
export { snapshot } from "./snapshot";
export { appendMetadata } from "./metadata";
export { waitForOperation } from "./wait";
