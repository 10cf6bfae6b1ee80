export {
  ClusterInstallationConfig,
  StaticInstallationConfig,
} from './installation.js';
export type { InstallationConfigLookup } from './installation.js';
