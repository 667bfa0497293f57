export {
  JsonFilePersistenceGateway,
  type JsonFilePersistenceGatewayOptions,
} from "./json-file-persistence-gateway.js"
