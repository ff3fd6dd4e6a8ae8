export {
  type CreateModelGatewayOptions,
  createModelGateway,
  type GatewayScope,
  ModelGateway,
  type ModelGatewayOptions,
} from "./gateway.js";
