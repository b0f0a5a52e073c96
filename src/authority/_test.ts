import { describe, expect, test, beforeAll, afterAll } from "vitest";
import { X509Certificate, createPrivateKey } from "node:crypto";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import forge from "node-forge";
import { ManualClock, mockContext, registrationFor } from "../mock";
import { AgentRegistry } from "../registry/src";
import { decodeCertificate, parseSubject, RootCaSigner, SelfSignedSigner, thumbprintOf } from "./ca";
import { CertificateAuthority, getSigner } from "./src";

const issueRequest = {
    commonName: "ws01.corp.example",
    organization: "Fleet Trust",
    organizationalUnit: "Collector Agent",
    country: "US",
    subjectAlternativeNames: [],
    notBefore: new Date("2026-01-01T00:00:00.000Z"),
    notAfter: new Date("2027-01-01T00:00:00.000Z"),
};

describe("SelfSignedSigner", () => {
    test("issues a client certificate with a PKCS#8 key", async () => {
        const issued = await new SelfSignedSigner().issue(issueRequest);

        expect(issued.serialNumber).toMatch(/^[1-7][0-9A-F]{31}$/);
        expect(issued.subject).toBe("CN=ws01.corp.example, O=Fleet Trust, OU=Collector Agent, C=US");
        expect(issued.issuer).toBe(issued.subject);

        const x509 = new X509Certificate(Buffer.from(issued.certificateData, "base64"));
        const key = createPrivateKey({ key: Buffer.from(issued.privateKeyData, "base64"), format: "der", type: "pkcs8" });
        expect(x509.checkPrivateKey(key)).toBe(true);
        expect(x509.fingerprint.replace(/:/g, "")).toBe(issued.thumbprint);
        expect(x509.keyUsage).toEqual(["1.3.6.1.5.5.7.3.2"]);
    });

    test("has no trust anchors", () => {
        const signer = new SelfSignedSigner();
        expect(signer.trustAnchors()).toEqual([]);
        expect(signer.caCertificatePem()).toBeNull();
    });
});

describe("RootCaSigner", () => {
    let dir: string;

    beforeAll(() => {
        dir = mkdtempSync(join(tmpdir(), "fleet-trust-ca-"));
    });

    afterAll(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    test("loadOrGenerate creates the CA once and reloads it", async () => {
        const first = await RootCaSigner.loadOrGenerate(dir);

        expect(existsSync(join(dir, "ca-key.pem"))).toBe(true);
        expect(readFileSync(join(dir, "ca-cert.pem"), "utf-8")).toBe(first.caCertificatePem());

        const second = await RootCaSigner.loadOrGenerate(dir);
        expect(second.caCertificatePem()).toBe(first.caCertificatePem());
    });

    test("signs agent certificates under the root", async () => {
        const signer = await RootCaSigner.loadOrGenerate(dir);
        const issued = await signer.issue(issueRequest);

        expect(issued.issuer).toBe("CN=Fleet Trust Root CA, O=Fleet Trust");
        const [anchor] = signer.trustAnchors();
        if (!anchor) throw new Error("no anchor");
        expect(anchor.verify(decodeCertificate(issued.certificateData))).toBe(true);
    });

    test("certificates it issued validate through the chain", async () => {
        const clock = new ManualClock();
        const ctx = mockContext({ clock });
        const registered = new AgentRegistry(ctx).register(registrationFor());
        if (!registered.success) throw new Error(registered.message);

        const authority = new CertificateAuthority(ctx, await getSigner({ mode: "root-ca", dataDir: dir }));
        const cert = await authority.generateCertificate({ agentId: registered.value.agentId, commonName: "dc01" });
        if (!cert.success) throw new Error(cert.message);

        const result = authority.validateCertificate({ certificateData: cert.value.certificateData });
        expect(result.success && result.value.validationErrors).toEqual([]);
        expect(authority.caCertificatePem()).toContain("BEGIN CERTIFICATE");
    });
});

describe("certificate helpers", () => {
    test("decodeCertificate accepts PEM and base64 DER alike", async () => {
        const issued = await new SelfSignedSigner().issue(issueRequest);
        const cert = decodeCertificate(issued.certificateData);
        const pem = forge.pki.certificateToPem(cert);

        expect(thumbprintOf(decodeCertificate(pem))).toBe(issued.thumbprint);
    });

    test("parseSubject reads the identity fields", () => {
        expect(parseSubject("CN=dc01, O=Fleet Trust, OU=Collector Agent, C=US")).toEqual({
            CN: "dc01",
            O: "Fleet Trust",
            OU: "Collector Agent",
            C: "US",
        });
        expect(parseSubject("CN=dc01, L=Nowhere")).toEqual({ CN: "dc01" });
    });

    test("getSigner defaults to self-signed", async () => {
        const signer = await getSigner({ mode: "self-signed", dataDir: "unused" });
        expect(signer.name).toBe("self-signed");
    });
});
