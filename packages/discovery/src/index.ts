export {
  generateDiscovery,
  serializeDiscovery,
  type Discovery,
  type DiscoveryTool,
  type DiscoveryOptions,
} from "./generator.js";

export { discoveryHandler } from "./middleware.js";
