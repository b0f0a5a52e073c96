import { describe, expect, test, beforeEach } from "vitest";
import { ManualClock, mockContext, registrationFor } from "../mock";
import type { ServiceContext } from "../context";
import { AgentRegistry } from "../registry/src";
import type { CertificateSigner } from "./interface";
import { SelfSignedSigner } from "./ca";
import { CertificateAuthority } from "./src";

describe("CertificateAuthority", () => {
    let clock: ManualClock;
    let ctx: ServiceContext;
    let registry: AgentRegistry;
    let authority: CertificateAuthority;
    let agentId: string;

    beforeEach(() => {
        clock = new ManualClock("2026-03-01T12:00:00.000Z");
        ctx = mockContext({ clock });
        registry = new AgentRegistry(ctx);
        authority = new CertificateAuthority(ctx, new SelfSignedSigner());

        const registered = registry.register(registrationFor());
        if (!registered.success) throw new Error(registered.message);
        agentId = registered.value.agentId;
    });

    async function issue(overrides: { validityDays?: number; subjectAlternativeNames?: string[] } = {}) {
        const result = await authority.generateCertificate({ agentId, commonName: "dc01.corp.example", ...overrides });
        if (!result.success) throw new Error(result.message);
        return result.value;
    }

    function rows() {
        return ctx.store.transaction((tx) => tx.certificates.listForAgent(agentId));
    }

    describe("generateCertificate", () => {
        test("issues a back-dated certificate and records it as Active", async () => {
            const cert = await issue({ validityDays: 30 });

            expect(cert.thumbprint).toMatch(/^[0-9A-F]{40}$/);
            expect(cert.issuedAt.toISOString()).toBe("2026-02-28T12:00:00.000Z");
            expect(cert.expiresAt.toISOString()).toBe("2026-03-30T12:00:00.000Z");

            const [row] = rows();
            expect(row?.thumbprint).toBe(cert.thumbprint);
            expect(row?.status).toBe("Active");
            expect(row?.usage).toBe("ClientAuthentication");
            expect(row?.subject).toBe("CN=dc01.corp.example, O=Fleet Trust, OU=Collector Agent, C=US");
            expect(row?.issuer).toBe(row?.subject);
            expect(row?.certificateData).toBe(cert.certificateData);
        });

        test("rejects an unknown agent without writing a row", async () => {
            const result = await authority.generateCertificate({ agentId: "missing", commonName: "x" });

            expect(result).toEqual({ success: false, error: "AgentNotFound", message: "Agent not found" });
        });

        test("rejects a deactivated agent", async () => {
            registry.deactivate(agentId);

            const result = await authority.generateCertificate({ agentId, commonName: "x" });
            expect(!result.success && result.error).toBe("AgentNotFound");
            expect(rows()).toHaveLength(0);
        });

        test("a signer failure leaves no row", async () => {
            const failing: CertificateSigner = {
                name: "failing",
                issue: async () => {
                    throw new Error("entropy exhausted");
                },
                trustAnchors: () => [],
                caCertificatePem: () => null,
            };
            const broken = new CertificateAuthority(ctx, failing);

            const result = await broken.generateCertificate({ agentId, commonName: "x" });

            expect(result).toEqual({
                success: false,
                error: "StoreFailure",
                message: "Certificate generation failed: entropy exhausted",
            });
            expect(rows()).toHaveLength(0);
        });

        test("classifies subject alternative names", async () => {
            await issue({ subjectAlternativeNames: ["dc01.corp.example", "10.0.0.5", "ops@corp.example"] });

            const listed = authority.listCertificates(agentId);
            expect(listed.success && listed.value[0]?.subjectAlternativeNames).toEqual([
                "dc01.corp.example",
                "10.0.0.5",
                "ops@corp.example",
            ]);
        });
    });

    describe("validateCertificate", () => {
        test("a fresh certificate is valid with default flags", async () => {
            const cert = await issue();

            const result = authority.validateCertificate({ certificateData: cert.certificateData });

            expect(result.success).toBe(true);
            if (!result.success) return;
            expect(result.value.isValid).toBe(true);
            expect(result.value.validationErrors).toEqual([]);
            expect(result.value.certificateInfo?.thumbprint).toBe(cert.thumbprint);
            expect(result.value.certificateInfo?.status).toBe("Active");
            expect(result.value.validatedAt.toISOString()).toBe("2026-03-01T12:00:00.000Z");
        });

        test("an expired certificate is invalid whatever the flags", async () => {
            const cert = await issue({ validityDays: 1 });
            const later = new Date("2026-03-02T00:00:00.000Z");

            for (const checkChain of [true, false]) {
                for (const checkRevocation of [true, false]) {
                    const result = authority.validateCertificate({
                        certificateData: cert.certificateData,
                        validateAtTime: later,
                        checkChain,
                        checkRevocation,
                    });
                    expect(result.success && result.value.validationErrors).toEqual(["Certificate has expired"]);
                    expect(result.success && result.value.isValid).toBe(false);
                }
            }
        });

        test("reports a certificate that is not yet valid", async () => {
            const cert = await issue();

            const result = authority.validateCertificate({
                certificateData: cert.certificateData,
                validateAtTime: new Date("2026-02-01T00:00:00.000Z"),
            });

            expect(result.success && result.value.validationErrors).toEqual(["Certificate is not yet valid"]);
        });

        test("a certificate this authority never issued does not chain", async () => {
            const otherCtx = mockContext({ clock });
            const otherRegistry = new AgentRegistry(otherCtx);
            const other = new CertificateAuthority(otherCtx, new SelfSignedSigner());
            const otherAgent = otherRegistry.register(registrationFor());
            if (!otherAgent.success) throw new Error(otherAgent.message);
            const foreign = await other.generateCertificate({ agentId: otherAgent.value.agentId, commonName: "rogue" });
            if (!foreign.success) throw new Error(foreign.message);

            const withChain = authority.validateCertificate({ certificateData: foreign.value.certificateData });
            expect(withChain.success && withChain.value.validationErrors).toEqual([
                "Certificate not found in database",
                "Certificate chain validation failed",
            ]);
            expect(withChain.success && withChain.value.certificateInfo?.status).toBeNull();

            const withoutChain = authority.validateCertificate({
                certificateData: foreign.value.certificateData,
                checkChain: false,
            });
            expect(withoutChain.success && withoutChain.value.validationErrors).toEqual([
                "Certificate not found in database",
            ]);
        });

        test("a revoked certificate fails the record and the chain", async () => {
            const cert = await issue();
            authority.revokeCertificate({ agentId, certificateThumbprint: cert.thumbprint, reason: "KeyCompromise" });

            const strict = authority.validateCertificate({ certificateData: cert.certificateData });
            expect(strict.success && strict.value.validationErrors).toEqual([
                "Certificate has been revoked",
                "Certificate chain validation failed",
            ]);

            const lenient = authority.validateCertificate({ certificateData: cert.certificateData, checkRevocation: false });
            expect(lenient.success && lenient.value.validationErrors).toEqual(["Certificate has been revoked"]);
        });

        test("undecodable input is invalid, not an error", () => {
            const result = authority.validateCertificate({ certificateData: "not a certificate!" });

            expect(result).toEqual({
                success: true,
                message: "Certificate is not valid",
                value: {
                    isValid: false,
                    validationErrors: ["Validation failed: Certificate data is not valid base64"],
                    certificateInfo: null,
                    validatedAt: new Date("2026-03-01T12:00:00.000Z"),
                },
            });
        });
    });

    describe("renewCertificate", () => {
        test("supersedes the old certificate and keeps the identity", async () => {
            const old = await issue({ subjectAlternativeNames: ["dc01.corp.example"] });
            clock.advance(1000);

            const result = await authority.renewCertificate({ agentId, currentThumbprint: old.thumbprint, validityDays: 90 });

            expect(result.success).toBe(true);
            if (!result.success) return;
            expect(result.value.newThumbprint).not.toBe(old.thumbprint);
            expect(result.value.oldCertificateRevoked).toBe(true);
            expect(result.value.expiresAt.getTime() - result.value.issuedAt.getTime()).toBe(90 * 24 * 60 * 60 * 1000);

            const [newest, previous] = rows();
            expect(newest?.thumbprint).toBe(result.value.newThumbprint);
            expect(newest?.status).toBe("Active");
            expect(newest?.subject).toBe(previous?.subject);
            expect(previous?.status).toBe("Superseded");
            expect(previous?.revocationReason).toBe("Superseded");
            expect(previous?.revokedAt?.toISOString()).toBe("2026-03-01T12:00:01.000Z");

            const listed = authority.listCertificates(agentId);
            expect(listed.success && listed.value[0]?.subjectAlternativeNames).toEqual(["dc01.corp.example"]);
        });

        test("can leave the old certificate Active", async () => {
            const old = await issue();
            clock.advance(1000);

            const result = await authority.renewCertificate({
                agentId,
                currentThumbprint: old.thumbprint,
                revokeOldCertificate: false,
            });

            expect(result.success && result.value.oldCertificateRevoked).toBe(false);
            expect(rows().map((r) => r.status)).toEqual(["Active", "Active"]);
        });

        test("does not supersede a revoked certificate", async () => {
            const old = await issue();
            authority.revokeCertificate({ agentId, certificateThumbprint: old.thumbprint, reason: "KeyCompromise" });
            clock.advance(1000);

            const result = await authority.renewCertificate({ agentId, currentThumbprint: old.thumbprint });

            expect(result.success && result.value.oldCertificateRevoked).toBe(false);
            expect(rows()[1]?.status).toBe("Revoked");
            expect(rows()[1]?.revocationReason).toBe("KeyCompromise");
        });

        test("unknown thumbprint", async () => {
            const result = await authority.renewCertificate({ agentId, currentThumbprint: "ABCDEF" });
            expect(result).toEqual({ success: false, error: "CertificateNotFound", message: "Certificate not found" });
        });

        test("passes a generation failure through unchanged", async () => {
            const old = await issue();
            registry.deactivate(agentId);

            const result = await authority.renewCertificate({ agentId, currentThumbprint: old.thumbprint });
            expect(result).toEqual({ success: false, error: "AgentNotFound", message: "Agent not found" });
        });
    });

    describe("revokeCertificate", () => {
        test("revokes once and rejects the second attempt untouched", async () => {
            const cert = await issue();

            const first = authority.revokeCertificate({ agentId, certificateThumbprint: cert.thumbprint, reason: "KeyCompromise" });
            expect(first).toEqual({
                success: true,
                message: "Certificate revoked successfully",
                value: { revokedAt: new Date("2026-03-01T12:00:00.000Z") },
            });

            clock.advance(60_000);
            const second = authority.revokeCertificate({
                agentId,
                certificateThumbprint: cert.thumbprint,
                reason: "CessationOfOperation",
            });
            expect(second).toEqual({ success: false, error: "AlreadyRevoked", message: "Certificate is already revoked" });

            const [row] = rows();
            expect(row?.status).toBe("Revoked");
            expect(row?.revokedAt?.toISOString()).toBe("2026-03-01T12:00:00.000Z");
            expect(row?.revocationReason).toBe("KeyCompromise");
        });

        test("a superseded certificate can still be revoked", async () => {
            const old = await issue();
            clock.advance(1000);
            await authority.renewCertificate({ agentId, currentThumbprint: old.thumbprint });

            const result = authority.revokeCertificate({ agentId, certificateThumbprint: old.thumbprint, reason: "Superseded" });
            expect(result.success).toBe(true);
        });

        test("thumbprint of another agent is not found", async () => {
            const cert = await issue();
            const other = registry.register(registrationFor({ machineName: "DC02" }));
            if (!other.success) throw new Error(other.message);

            const result = authority.revokeCertificate({
                agentId: other.value.agentId,
                certificateThumbprint: cert.thumbprint,
                reason: "Unspecified",
            });
            expect(!result.success && result.error).toBe("CertificateNotFound");
        });
    });

    test("listCertificates orders newest first and needs a known agent", async () => {
        const first = await issue();
        clock.advance(1000);
        const second = await issue();

        const listed = authority.listCertificates(agentId);
        expect(listed.success && listed.value.map((c) => c.thumbprint)).toEqual([second.thumbprint, first.thumbprint]);

        const missing = authority.listCertificates("missing");
        expect(!missing.success && missing.error).toBe("AgentNotFound");
    });
});
