import { serve } from "@hono/node-server";
import type { z } from "zod";
import pkg from "../../package.json";
import type { Core } from "../core";
import type { Logger } from "../logger";
import type { ErrorKind, Result } from "../result";
import {
    CertificatesQuerySchema,
    ConfigurationSchema,
    ErrorReportSchema,
    GenerateCertificateSchema,
    HeartbeatSchema,
    RegisterSchema,
    RenewCertificateSchema,
    RetrySchema,
    RevokeCertificateSchema,
    SubmissionsQuerySchema,
    SubmitDataSchema,
    ValidateCertificateSchema,
} from "./schemas";

export const API_PREFIX = "/api/agents";

const corsHeaders = {
    "Access-Control-Allow-Origin": "*",
    "Access-Control-Allow-Methods": "GET, POST, PUT, DELETE, OPTIONS",
    "Access-Control-Allow-Headers": "Content-Type",
};

export const STATUS_BY_ERROR: Record<ErrorKind, number> = {
    InvalidRequest: 400,
    AgentNotFound: 404,
    CertificateNotFound: 404,
    SubmissionNotFound: 404,
    AlreadyRevoked: 409,
    RetryLimitExceeded: 409,
    HandlerFailure: 422,
    RegistrationError: 422,
    ValidationFailed: 422,
    StoreFailure: 500,
};

class RequestError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "RequestError";
    }
}

function json(body: object, status: number = 200): Response {
    return Response.json(body, { status, headers: corsHeaders });
}

function notFound(): Response {
    return json({ success: false, message: "Not Found" }, 404);
}

function check<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
    const parsed = schema.safeParse(input);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
        throw new RequestError(`Invalid request: ${issues.join("; ")}`);
    }
    return parsed.data;
}

function pathParam(raw: string | undefined): string {
    try {
        return decodeURIComponent(raw ?? "");
    } catch {
        throw new RequestError("Invalid request: malformed path segment");
    }
}

async function readBody<S extends z.ZodTypeAny>(req: Request, schema: S): Promise<z.output<S>> {
    const raw = await req.text();
    let body: unknown = {};
    if (raw.trim().length > 0) {
        try {
            body = JSON.parse(raw);
        } catch {
            throw new RequestError("Request body is not valid JSON");
        }
    }
    return check(schema, body);
}

/**
 * Success bodies are `{ success, message, ...fields }`; failures carry the
 * error kind and any row identifiers written before the failure.
 */
function respond<T>(result: Result<T>, fields: (value: T) => object): Response {
    if (!result.success) {
        return json(
            { success: false, error: result.error, message: result.message, ...result.details },
            STATUS_BY_ERROR[result.error]
        );
    }
    return json({ success: true, message: result.message, ...fields(result.value) });
}

const asIs = <T extends object>(value: T) => value;
const nothing = () => ({});

export function createHandler(core: Core, logger: Logger) {
    return async function handleRequest(req: Request): Promise<Response> {
        const url = new URL(req.url);
        const method = req.method;

        if (method === "OPTIONS") {
            return new Response(null, { headers: corsHeaders });
        }
        if (url.pathname !== API_PREFIX && !url.pathname.startsWith(`${API_PREFIX}/`)) {
            return notFound();
        }
        const path = url.pathname.slice(API_PREFIX.length).replace(/\/+$/, "");
        const query = Object.fromEntries(url.searchParams);

        try {
            // GET /api/agents
            if (method === "GET" && path === "") {
                return respond(core.registry.list(), (agents) => ({ agents }));
            }

            if (method === "GET" && path === "/version") {
                return json({ success: true, message: "Fleet Trust gateway", version: pkg.version });
            }

            if (method === "POST" && path === "/register") {
                const { os, ...body } = await readBody(req, RegisterSchema);
                return respond(
                    core.registry.register({ ...body, operatingSystem: body.operatingSystem ?? os }),
                    asIs
                );
            }

            if (method === "POST" && path === "/heartbeat") {
                return respond(core.registry.heartbeat(await readBody(req, HeartbeatSchema)), asIs);
            }

            if (method === "POST" && path === "/submit-data") {
                return respond(core.submissions.submitData(await readBody(req, SubmitDataSchema)), asIs);
            }

            if (method === "POST" && path === "/errors/report") {
                return respond(core.errors.reportErrors(await readBody(req, ErrorReportSchema)), asIs);
            }

            // Certificates
            if (method === "GET" && path === "/certificates") {
                const { agentId } = check(CertificatesQuerySchema, query);
                return respond(core.authority.listCertificates(agentId), (certificates) => ({ certificates }));
            }

            if (method === "GET" && path === "/certificates/authority") {
                const pem = core.authority.caCertificatePem();
                if (!pem) {
                    return json(
                        { success: false, error: "CertificateNotFound", message: "Certificates are self-signed" },
                        404
                    );
                }
                return new Response(pem, { headers: { ...corsHeaders, "Content-Type": "application/x-pem-file" } });
            }

            if (method === "POST" && path === "/certificates/generate") {
                const body = await readBody(req, GenerateCertificateSchema);
                return respond(await core.authority.generateCertificate(body), asIs);
            }

            if (method === "POST" && path === "/certificates/validate") {
                const body = await readBody(req, ValidateCertificateSchema);
                return respond(core.authority.validateCertificate(body), asIs);
            }

            if (method === "POST" && path === "/certificates/renew") {
                const body = await readBody(req, RenewCertificateSchema);
                return respond(await core.authority.renewCertificate(body), asIs);
            }

            if (method === "POST" && path === "/certificates/revoke") {
                const body = await readBody(req, RevokeCertificateSchema);
                return respond(core.authority.revokeCertificate(body), asIs);
            }

            // POST /api/agents/submissions/:id/retry
            const retryMatch = path.match(/^\/submissions\/([^\/]+)\/retry$/);
            if (method === "POST" && retryMatch) {
                const submissionId = pathParam(retryMatch[1]);
                const { delaySeconds } = await readBody(req, RetrySchema);
                return respond(core.submissions.scheduleRetry(submissionId, delaySeconds), asIs);
            }

            // Agent specific routes
            const agentMatch = path.match(/^\/([^\/]+)(\/[a-z]+)?$/);
            if (agentMatch) {
                const agentId = pathParam(agentMatch[1]);
                const subPath = agentMatch[2] ?? "";

                if (method === "GET" && subPath === "") {
                    return respond(core.registry.get(agentId), asIs);
                }

                if (method === "DELETE" && subPath === "") {
                    return respond(core.registry.deactivate(agentId), nothing);
                }

                if (method === "PUT" && subPath === "/configuration") {
                    const configuration = await readBody(req, ConfigurationSchema);
                    return respond(core.registry.updateConfiguration(agentId, configuration), nothing);
                }

                if (method === "GET" && subPath === "/submissions") {
                    const { limit } = check(SubmissionsQuerySchema, query);
                    return respond(core.submissions.listSubmissions(agentId, limit), (submissions) => ({
                        submissions,
                    }));
                }

                if (method === "GET" && subPath === "/errors") {
                    return respond(core.errors.listErrors(agentId), (errors) => ({ errors }));
                }
            }

            return notFound();
        } catch (error) {
            if (error instanceof RequestError) {
                logger.debug(`${method} ${url.pathname}: ${error.message}`);
                return json({ success: false, error: "InvalidRequest", message: error.message }, 400);
            }
            logger.error(`${method} ${url.pathname} failed`, error);
            return json({ success: false, error: "StoreFailure", message: "Internal Server Error" }, 500);
        }
    };
}

export function startGateway(core: Core, options: { port: number; logger: Logger }) {
    const { port, logger } = options;
    return serve({ fetch: createHandler(core, logger), port }, (info) => {
        logger.info(`Gateway listening on port ${info.port} (storage: ${core.store.kind})`);
    });
}
