export * from "./types.js";
export * from "./errors.js";
export * from "./bindingKey.js";
export * from "./issuanceResponseEncryption.js";
export * from "./formats/index.js";
export * from "./http/httpGet.js";
export * from "./metadata/credentialIssuerMetadata.js";
export * from "./metadata/authorizationServerMetadata.js";
export * from "./offer/parseCredentialOffer.js";
export * from "./offer/grants.js";
export * from "./offer/assembleCredentialOffer.js";
export * from "./offer/credentialOfferRequestResolver.js";
export * from "./proof/proofBuilder.js";
export * from "./proof/ed25519Signer.js";
