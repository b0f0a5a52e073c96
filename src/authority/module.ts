export * from "./interface";
export { CertificateAuthority, CERTIFICATE_DEFAULTS, getSigner } from "./src";
export { RootCaSigner, SelfSignedSigner, decodeCertificate, thumbprintOf } from "./ca";
