import type forge from "node-forge";
import type { CertificateStatus } from "../storage/interface";

export const REVOCATION_REASONS = [
    "Unspecified",
    "KeyCompromise",
    "CertificateAuthorityCompromise",
    "AffiliationChanged",
    "Superseded",
    "CessationOfOperation",
    "CertificateHold",
    "RemoveFromCRL",
    "PrivilegeWithdrawn",
    "AttributeAuthorityCompromise",
] as const;
export type RevocationReason = (typeof REVOCATION_REASONS)[number];

/**
 * Request DTO for issuing an agent certificate. Omitted subject fields and
 * validity fall back to the authority defaults.
 */
export interface CertificateRequest {
    agentId: string;
    commonName: string;
    organization?: string;
    organizationalUnit?: string;
    country?: string;
    validityDays?: number;
    /** Classified by syntax: e-mail, IP address, otherwise DNS name */
    subjectAlternativeNames?: string[];
}

/**
 * What a signer is asked to produce. The validity window is decided by the
 * authority, not the signer.
 */
export interface IssueRequest {
    commonName: string;
    organization: string;
    organizationalUnit: string;
    country: string;
    subjectAlternativeNames: string[];
    notBefore: Date;
    notAfter: Date;
}

export interface IssuedCertificate {
    /** Base64 DER */
    certificateData: string;
    /** Base64 PKCS#8 */
    privateKeyData: string;
    thumbprint: string;
    serialNumber: string;
    subject: string;
    issuer: string;
    notBefore: Date;
    notAfter: Date;
}

/**
 * The signing step of issuance. Swapping the signer changes who vouches for
 * agent certificates without touching the callers.
 */
export interface CertificateSigner {
    readonly name: string;
    issue(request: IssueRequest): Promise<IssuedCertificate>;
    /** Certificates that terminate a trusted chain */
    trustAnchors(): forge.pki.Certificate[];
    /** PEM of the issuing CA, or null when certificates are self-signed */
    caCertificatePem(): string | null;
}

export interface GeneratedCertificate {
    certificateData: string;
    privateKeyData: string;
    thumbprint: string;
    serialNumber: string;
    issuedAt: Date;
    expiresAt: Date;
}

export interface ValidationRequest {
    certificateData: string;
    validateAtTime?: Date | null;
    checkChain?: boolean;
    checkRevocation?: boolean;
}

export interface CertificateInfo {
    subject: string;
    issuer: string;
    thumbprint: string;
    serialNumber: string;
    notBefore: Date;
    notAfter: Date;
    subjectAlternativeNames: string[];
    usage: string | null;
    /** Null when the certificate was not issued by this authority */
    status: CertificateStatus | null;
    issuedAt: Date | null;
    revokedAt: Date | null;
    revocationReason: string | null;
}

export interface ValidationReport {
    isValid: boolean;
    validationErrors: string[];
    certificateInfo: CertificateInfo | null;
    validatedAt: Date;
}

export interface RenewalRequest {
    agentId: string;
    currentThumbprint: string;
    validityDays?: number;
    revokeOldCertificate?: boolean;
}

export interface RenewedCertificate {
    newThumbprint: string;
    newSerialNumber: string;
    certificateData: string;
    privateKeyData: string;
    issuedAt: Date;
    expiresAt: Date;
    oldCertificateRevoked: boolean;
}

export interface RevocationRequest {
    agentId: string;
    certificateThumbprint: string;
    reason: RevocationReason;
}

export interface Revocation {
    revokedAt: Date;
}
