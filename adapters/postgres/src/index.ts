export {
  PostgresPersistenceGateway,
  type PostgresPersistenceGatewayOptions,
  type QueryInterface,
} from "./postgres-persistence-gateway.js"
