export {
  ContractRegistry,
  ContractRegistryBuilder,
  ContractRegistryError,
  normalizeAddressKey,
} from "./contracts";
