import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { isIP } from "node:net";
import { join } from "node:path";
import forge from "node-forge";
import type { CertificateSigner, IssueRequest, IssuedCertificate } from "./interface";

const KEY_BITS = 2048;

/**
 * RSA key generation off the event loop. On Node, forge hands this to the
 * native crypto module.
 */
export function generateKeyPair(bits: number = KEY_BITS): Promise<forge.pki.rsa.KeyPair> {
    return new Promise((resolve, reject) => {
        forge.pki.rsa.generateKeyPair({ bits }, (err, keypair) => {
            if (err) reject(err);
            else resolve(keypair);
        });
    });
}

function derBytes(cert: forge.pki.Certificate): string {
    return forge.asn1.toDer(forge.pki.certificateToAsn1(cert)).getBytes();
}

/** Uppercase hex SHA-1 of the DER encoding */
export function thumbprintOf(cert: forge.pki.Certificate): string {
    return forge.md.sha1.create().update(derBytes(cert)).digest().toHex().toUpperCase();
}

export function encodeCertificate(cert: forge.pki.Certificate): string {
    return forge.util.encode64(derBytes(cert));
}

/**
 * Accepts base64 DER, or PEM for callers that kept the CA's format.
 */
export function decodeCertificate(data: string): forge.pki.Certificate {
    const text = data.trim();
    if (text.startsWith("-----BEGIN")) {
        return forge.pki.certificateFromPem(text);
    }
    if (text.length === 0 || !/^[A-Za-z0-9+/=\s]+$/.test(text)) {
        throw new Error("Certificate data is not valid base64");
    }
    return forge.pki.certificateFromAsn1(forge.asn1.fromDer(forge.util.decode64(text)));
}

function encodePrivateKey(key: forge.pki.rsa.PrivateKey): string {
    const pkcs8 = forge.pki.wrapRsaPrivateKey(forge.pki.privateKeyToAsn1(key));
    return forge.util.encode64(forge.asn1.toDer(pkcs8).getBytes());
}

/**
 * Positive 128-bit serial with a non-zero leading nibble.
 */
function randomSerial(): string {
    const bytes = forge.random.getBytesSync(16);
    const lead = (bytes.charCodeAt(0) & 0x7f) | 0x10;
    return forge.util.bytesToHex(String.fromCharCode(lead) + bytes.slice(1));
}

const SHORT_NAMES = ["CN", "O", "OU", "C"] as const;
type ShortName = (typeof SHORT_NAMES)[number];

function subjectAttributes(req: IssueRequest): forge.pki.CertificateField[] {
    const attrs: forge.pki.CertificateField[] = [{ name: "commonName", value: req.commonName }];
    if (req.organization) attrs.push({ name: "organizationName", value: req.organization });
    if (req.organizationalUnit) attrs.push({ name: "organizationalUnitName", value: req.organizationalUnit });
    if (req.country) attrs.push({ name: "countryName", value: req.country });
    return attrs;
}

/** Renders a distinguished name as `CN=.., O=.., OU=.., C=..` */
export function describeName(name: forge.pki.Certificate["subject"]): string {
    return name.attributes
        .map((attr) => `${attr.shortName ?? attr.name ?? attr.type}=${String(attr.value)}`)
        .join(", ");
}

/**
 * Reads CN, O, OU and C back out of a stored subject string.
 */
export function parseSubject(subject: string): Partial<Record<ShortName, string>> {
    const fields: Partial<Record<ShortName, string>> = {};
    for (const part of subject.split(/,\s*/)) {
        const eq = part.indexOf("=");
        if (eq < 0) continue;
        const key = part.slice(0, eq).trim();
        const short = SHORT_NAMES.find((s) => s === key);
        if (short) fields[short] = part.slice(eq + 1).trim();
    }
    return fields;
}

interface AltName {
    type: number;
    value?: string;
    ip?: string;
}

function altNamesOf(names: string[]): AltName[] {
    return names.map((name) => {
        if (name.includes("@")) return { type: 1, value: name };
        if (isIP(name) !== 0) return { type: 7, ip: name };
        return { type: 2, value: name };
    });
}

function hasAltNames(ext: unknown): ext is { altNames: AltName[] } {
    return typeof ext === "object" && ext !== null && "altNames" in ext && Array.isArray(ext.altNames);
}

export function readAltNames(cert: forge.pki.Certificate): string[] {
    const ext = cert.getExtension("subjectAltName");
    if (!hasAltNames(ext)) return [];
    return ext.altNames.flatMap((alt) => {
        const value = alt.type === 7 ? alt.ip : alt.value;
        return value ? [value] : [];
    });
}

function clientExtensions(req: IssueRequest): object[] {
    const extensions: object[] = [
        { name: "basicConstraints", cA: false },
        { name: "keyUsage", digitalSignature: true, keyEncipherment: true, critical: true },
        // forge's chain check rejects unknown critical extensions, so this one stays non-critical
        { name: "extKeyUsage", clientAuth: true },
        { name: "subjectKeyIdentifier" },
    ];
    if (req.subjectAlternativeNames.length > 0) {
        extensions.push({ name: "subjectAltName", altNames: altNamesOf(req.subjectAlternativeNames) });
    }
    return extensions;
}

function toIssued(cert: forge.pki.Certificate, key: forge.pki.rsa.PrivateKey): IssuedCertificate {
    return {
        certificateData: encodeCertificate(cert),
        privateKeyData: encodePrivateKey(key),
        thumbprint: thumbprintOf(cert),
        serialNumber: cert.serialNumber.toUpperCase(),
        subject: describeName(cert.subject),
        issuer: describeName(cert.issuer),
        notBefore: cert.validity.notBefore,
        notAfter: cert.validity.notAfter,
    };
}

/**
 * Each agent certificate signs itself. Trust comes from the authority having
 * recorded the thumbprint at issuance.
 */
export class SelfSignedSigner implements CertificateSigner {
    readonly name = "self-signed";

    async issue(req: IssueRequest): Promise<IssuedCertificate> {
        const keys = await generateKeyPair();

        const cert = forge.pki.createCertificate();
        cert.publicKey = keys.publicKey;
        cert.serialNumber = randomSerial();
        cert.validity.notBefore = req.notBefore;
        cert.validity.notAfter = req.notAfter;

        const attrs = subjectAttributes(req);
        cert.setSubject(attrs);
        cert.setIssuer(attrs);
        cert.setExtensions(clientExtensions(req));
        cert.sign(keys.privateKey, forge.md.sha256.create());

        return toIssued(cert, keys.privateKey);
    }

    trustAnchors(): forge.pki.Certificate[] {
        return [];
    }

    caCertificatePem(): string | null {
        return null;
    }
}

/**
 * A file-backed root CA that signs agent certificates. The key and
 * certificate live as PEM files in `dataDir`.
 */
export class RootCaSigner implements CertificateSigner {
    readonly name = "root-ca";
    private caKey: forge.pki.rsa.PrivateKey;
    private caCert: forge.pki.Certificate;

    constructor(caKeyPem: string, private caCertPem: string) {
        this.caKey = forge.pki.privateKeyFromPem(caKeyPem);
        this.caCert = forge.pki.certificateFromPem(caCertPem);
    }

    static async loadOrGenerate(dataDir: string, commonName: string = "Fleet Trust Root CA"): Promise<RootCaSigner> {
        const caKeyPath = join(dataDir, "ca-key.pem");
        const caCertPath = join(dataDir, "ca-cert.pem");

        if (!existsSync(dataDir)) {
            mkdirSync(dataDir, { recursive: true });
        }

        if (existsSync(caKeyPath) && existsSync(caCertPath)) {
            return new RootCaSigner(readFileSync(caKeyPath, "utf-8"), readFileSync(caCertPath, "utf-8"));
        }

        const keys = await generateKeyPair();

        const cert = forge.pki.createCertificate();
        cert.publicKey = keys.publicKey;
        cert.serialNumber = randomSerial();
        cert.validity.notBefore = new Date();
        cert.validity.notAfter = new Date();
        cert.validity.notAfter.setFullYear(cert.validity.notBefore.getFullYear() + 10);

        const attrs = [
            { name: "commonName", value: commonName },
            { name: "organizationName", value: "Fleet Trust" },
        ];
        cert.setSubject(attrs);
        cert.setIssuer(attrs);
        cert.setExtensions([
            { name: "basicConstraints", cA: true, critical: true },
            { name: "keyUsage", keyCertSign: true, cRLSign: true, critical: true },
            { name: "subjectKeyIdentifier" },
        ]);
        cert.sign(keys.privateKey, forge.md.sha256.create());

        const keyPem = forge.pki.privateKeyToPem(keys.privateKey);
        const certPem = forge.pki.certificateToPem(cert);

        writeFileSync(caKeyPath, keyPem, { mode: 0o600 });
        writeFileSync(caCertPath, certPem);

        return new RootCaSigner(keyPem, certPem);
    }

    async issue(req: IssueRequest): Promise<IssuedCertificate> {
        const keys = await generateKeyPair();

        const cert = forge.pki.createCertificate();
        cert.publicKey = keys.publicKey;
        cert.serialNumber = randomSerial();
        cert.validity.notBefore = req.notBefore;
        cert.validity.notAfter = req.notAfter;

        cert.setSubject(subjectAttributes(req));
        cert.setIssuer(this.caCert.subject.attributes);
        cert.setExtensions(clientExtensions(req));
        cert.sign(this.caKey, forge.md.sha256.create());

        return toIssued(cert, keys.privateKey);
    }

    trustAnchors(): forge.pki.Certificate[] {
        return [this.caCert];
    }

    caCertificatePem(): string {
        return this.caCertPem;
    }
}
