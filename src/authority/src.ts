import { randomUUID } from "node:crypto";
import forge from "node-forge";
import type { AuthorityConfig } from "../config";
import type { ServiceContext } from "../context";
import type { Logger } from "../logger";
import { requireActiveAgent, requireAgent } from "../registry/src";
import { CoreError, errorMessage, logFailure, ok, type Result } from "../result";
import type { CertificateRecord, StoreTransaction } from "../storage/interface";
import { decodeCertificate, describeName, parseSubject, readAltNames, RootCaSigner, SelfSignedSigner, thumbprintOf } from "./ca";
import type {
    CertificateInfo,
    CertificateRequest,
    CertificateSigner,
    GeneratedCertificate,
    RenewalRequest,
    RenewedCertificate,
    Revocation,
    RevocationRequest,
    ValidationReport,
    ValidationRequest,
} from "./interface";

const DAY_MS = 24 * 60 * 60 * 1000;

export const CERTIFICATE_DEFAULTS = {
    organization: "Fleet Trust",
    organizationalUnit: "Collector Agent",
    country: "US",
    validityDays: 365,
} as const;

const CLIENT_USAGE = "ClientAuthentication";

function infoFromRecord(record: CertificateRecord): CertificateInfo {
    let subjectAlternativeNames: string[] = [];
    if (record.certificateData) {
        subjectAlternativeNames = readAltNames(decodeCertificate(record.certificateData));
    }
    return {
        subject: record.subject,
        issuer: record.issuer,
        thumbprint: record.thumbprint,
        serialNumber: record.serialNumber,
        notBefore: record.notBefore,
        notAfter: record.notAfter,
        subjectAlternativeNames,
        usage: record.usage,
        status: record.status,
        issuedAt: record.issuedAt,
        revokedAt: record.revokedAt,
        revocationReason: record.revocationReason,
    };
}

function infoFromCertificate(cert: forge.pki.Certificate, record: CertificateRecord | null): CertificateInfo {
    return {
        subject: describeName(cert.subject),
        issuer: describeName(cert.issuer),
        thumbprint: thumbprintOf(cert),
        serialNumber: cert.serialNumber.toUpperCase(),
        notBefore: cert.validity.notBefore,
        notAfter: cert.validity.notAfter,
        subjectAlternativeNames: readAltNames(cert),
        usage: record?.usage ?? null,
        status: record?.status ?? null,
        issuedAt: record?.issuedAt ?? null,
        revokedAt: record?.revokedAt ?? null,
        revocationReason: record?.revocationReason ?? null,
    };
}

/**
 * Issuance, validation, renewal and revocation of agent certificates.
 *
 * Key generation and signing happen outside any store transaction; the row
 * for a new certificate is only written once the signer has returned.
 */
export class CertificateAuthority {
    private logger: Logger;

    constructor(private ctx: ServiceContext, private signer: CertificateSigner) {
        this.logger = ctx.logger.child("Authority");
    }

    /** PEM of the issuing CA, or null when agents hold self-signed certificates */
    caCertificatePem(): string | null {
        return this.signer.caCertificatePem();
    }

    async generateCertificate(req: CertificateRequest): Promise<Result<GeneratedCertificate>> {
        try {
            this.ctx.store.transaction((tx) => requireActiveAgent(tx, req.agentId));

            // Back-dated one day for clock skew between the service and the agent.
            const now = this.ctx.clock();
            const notBefore = new Date(Math.floor((now.getTime() - DAY_MS) / 1000) * 1000);
            const validityDays = req.validityDays ?? CERTIFICATE_DEFAULTS.validityDays;
            const notAfter = new Date(notBefore.getTime() + validityDays * DAY_MS);

            const issued = await this.signer.issue({
                commonName: req.commonName,
                organization: req.organization ?? CERTIFICATE_DEFAULTS.organization,
                organizationalUnit: req.organizationalUnit ?? CERTIFICATE_DEFAULTS.organizationalUnit,
                country: req.country ?? CERTIFICATE_DEFAULTS.country,
                subjectAlternativeNames: req.subjectAlternativeNames ?? [],
                notBefore,
                notAfter,
            });

            this.ctx.store.transaction((tx) => {
                // The agent may have been deactivated while the key was generated.
                requireActiveAgent(tx, req.agentId);
                tx.certificates.insert({
                    id: randomUUID(),
                    agentId: req.agentId,
                    thumbprint: issued.thumbprint,
                    serialNumber: issued.serialNumber,
                    subject: issued.subject,
                    issuer: issued.issuer,
                    notBefore: issued.notBefore,
                    notAfter: issued.notAfter,
                    issuedAt: now,
                    status: "Active",
                    usage: CLIENT_USAGE,
                    revokedAt: null,
                    revocationReason: null,
                    certificateData: issued.certificateData,
                });
            });

            this.logger.info(`Issued certificate ${issued.thumbprint} for agent ${req.agentId} (${this.signer.name})`);

            return ok(
                {
                    certificateData: issued.certificateData,
                    privateKeyData: issued.privateKeyData,
                    thumbprint: issued.thumbprint,
                    serialNumber: issued.serialNumber,
                    issuedAt: issued.notBefore,
                    expiresAt: issued.notAfter,
                },
                "Certificate generated successfully"
            );
        } catch (err) {
            return logFailure(this.logger, err, "StoreFailure", "Certificate generation failed");
        }
    }

    /**
     * Runs every check and reports all that fail. Never fails itself: an
     * undecodable certificate is an invalid one.
     */
    validateCertificate(req: ValidationRequest): Result<ValidationReport> {
        const validatedAt = this.ctx.clock();
        const at = req.validateAtTime ?? validatedAt;
        const checkChain = req.checkChain ?? true;
        const checkRevocation = req.checkRevocation ?? true;

        const invalid = (message: string): Result<ValidationReport> =>
            ok(
                { isValid: false, validationErrors: [`Validation failed: ${message}`], certificateInfo: null, validatedAt },
                "Certificate is not valid"
            );

        let cert: forge.pki.Certificate;
        try {
            cert = decodeCertificate(req.certificateData);
        } catch (err) {
            this.logger.debug(`Undecodable certificate: ${errorMessage(err)}`);
            return invalid(errorMessage(err));
        }

        try {
            const errors: string[] = [];
            if (cert.validity.notAfter < at) errors.push("Certificate has expired");
            if (cert.validity.notBefore > at) errors.push("Certificate is not yet valid");

            const thumbprint = thumbprintOf(cert);
            const record = this.ctx.store.transaction((tx) => {
                const stored = tx.certificates.findByThumbprint(thumbprint);
                if (!stored) {
                    errors.push("Certificate not found in database");
                } else if (stored.status === "Revoked") {
                    errors.push("Certificate has been revoked");
                }
                if (checkChain && !this.chainBuilds(tx, cert, stored !== null, checkRevocation)) {
                    errors.push("Certificate chain validation failed");
                }
                return stored;
            });

            const isValid = errors.length === 0;
            return ok(
                { isValid, validationErrors: errors, certificateInfo: infoFromCertificate(cert, record), validatedAt },
                isValid ? "Certificate is valid" : "Certificate is not valid"
            );
        } catch (err) {
            this.logger.error(`Certificate validation failed: ${errorMessage(err)}`, err);
            return invalid(errorMessage(err));
        }
    }

    /**
     * Chain verification is date-agnostic; the window is checked separately.
     * A self-issued certificate is its own anchor once this authority has
     * recorded it.
     */
    private chainBuilds(
        tx: StoreTransaction,
        cert: forge.pki.Certificate,
        recorded: boolean,
        checkRevocation: boolean
    ): boolean {
        const anchors = [...this.signer.trustAnchors()];
        if (recorded && cert.isIssuer(cert)) {
            anchors.push(cert);
        }

        try {
            return forge.pki.verifyCertificateChain(forge.pki.createCaStore(anchors), [cert], {
                validityCheckDate: null,
                verify: (verified, _depth, chain) => {
                    if (verified !== true) return false;
                    if (!checkRevocation) return true;
                    return !chain.some((c) => tx.certificates.findByThumbprint(thumbprintOf(c))?.status === "Revoked");
                },
            });
        } catch (err) {
            this.logger.debug(`Chain did not build: ${errorMessage(err)}`);
            return false;
        }
    }

    /**
     * Issues a replacement with the same subject identity. The old
     * certificate is superseded only while it is still Active.
     */
    async renewCertificate(req: RenewalRequest): Promise<Result<RenewedCertificate>> {
        try {
            const { agent, current } = this.ctx.store.transaction((tx) => {
                const agent = requireActiveAgent(tx, req.agentId);
                const current = tx.certificates.findForAgent(req.agentId, req.currentThumbprint);
                if (!current) {
                    throw new CoreError("CertificateNotFound", "Certificate not found");
                }
                return { agent, current };
            });

            const identity = parseSubject(current.subject);
            const generated = await this.generateCertificate({
                agentId: req.agentId,
                commonName: identity.CN ?? agent.machineName,
                organization: identity.O,
                organizationalUnit: identity.OU,
                country: identity.C,
                validityDays: req.validityDays,
                subjectAlternativeNames: current.certificateData
                    ? readAltNames(decodeCertificate(current.certificateData))
                    : [],
            });
            if (!generated.success) {
                return generated;
            }

            const now = this.ctx.clock();
            const oldCertificateRevoked =
                (req.revokeOldCertificate ?? true) &&
                this.ctx.store.transaction((tx) => {
                    const old = tx.certificates.findByThumbprint(current.thumbprint);
                    if (!old || old.status !== "Active") return false;
                    tx.certificates.update({ ...old, status: "Superseded", revokedAt: now, revocationReason: "Superseded" });
                    return true;
                });

            this.logger.info(`Renewed certificate ${current.thumbprint} as ${generated.value.thumbprint} for agent ${req.agentId}`);

            return ok(
                {
                    newThumbprint: generated.value.thumbprint,
                    newSerialNumber: generated.value.serialNumber,
                    certificateData: generated.value.certificateData,
                    privateKeyData: generated.value.privateKeyData,
                    issuedAt: generated.value.issuedAt,
                    expiresAt: generated.value.expiresAt,
                    oldCertificateRevoked,
                },
                "Certificate renewed successfully"
            );
        } catch (err) {
            return logFailure(this.logger, err, "StoreFailure", "Certificate renewal failed");
        }
    }

    /**
     * Read, check and write happen in one transaction, so of two concurrent
     * revocations exactly one succeeds.
     */
    revokeCertificate(req: RevocationRequest): Result<Revocation> {
        try {
            const revokedAt = this.ctx.clock();
            this.ctx.store.transaction((tx) => {
                requireAgent(tx, req.agentId);
                const certificate = tx.certificates.findForAgent(req.agentId, req.certificateThumbprint);
                if (!certificate) {
                    throw new CoreError("CertificateNotFound", "Certificate not found");
                }
                if (certificate.status === "Revoked") {
                    throw new CoreError("AlreadyRevoked", "Certificate is already revoked");
                }
                tx.certificates.update({ ...certificate, status: "Revoked", revokedAt, revocationReason: req.reason });
            });

            this.logger.info(`Revoked certificate ${req.certificateThumbprint} of agent ${req.agentId}: ${req.reason}`);
            return ok({ revokedAt }, "Certificate revoked successfully");
        } catch (err) {
            return logFailure(this.logger, err, "StoreFailure", "Certificate revocation failed");
        }
    }

    listCertificates(agentId: string): Result<CertificateInfo[]> {
        try {
            const records = this.ctx.store.transaction((tx) => {
                requireAgent(tx, agentId);
                return tx.certificates.listForAgent(agentId);
            });
            return ok(records.map(infoFromRecord), `${records.length} certificates`);
        } catch (err) {
            return logFailure(this.logger, err, "StoreFailure", "Failed to list certificates");
        }
    }
}

export async function getSigner(config: AuthorityConfig): Promise<CertificateSigner> {
    switch (config.mode) {
        case "root-ca":
            return RootCaSigner.loadOrGenerate(config.dataDir);
        case "self-signed":
        default:
            return new SelfSignedSigner();
    }
}
