export {
  PriceRegistry,
  PricingError,
  PAYMENT_HEADERS,
  PROOF_FIELDS,
  samePrice,
  acceptedProofFormats,
} from "./registry.js";
export { PriceBuilder, price } from "./builder.js";
export type {
  PriceTerms,
  PriceDescriptor,
  PricedTool,
  ProofFormat,
  PaymentReceipt,
} from "./types.js";
