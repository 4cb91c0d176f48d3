/**
 * @meshkit/three - three.js gateway for meshkit geometry buffers
 */

export {
  MeshGateway,
  indexFormatOf,
  DEFAULT_GATEWAY_OPTIONS,
  THREE_ATTRIBUTE_NAMES,
  type GatewayOptions,
} from './MeshAdapter.js';
