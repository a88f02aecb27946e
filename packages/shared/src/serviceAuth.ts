import { jwtVerify } from "jose";

const textEncoder = new TextEncoder();

export type ServiceCaller = {
  subject: string;
  scopes: string[];
};

export const extractBearerToken = (authHeader?: string) => {
  if (!authHeader?.startsWith("Bearer ")) {
    return null;
  }
  return authHeader.slice(7);
};

/**
 * Verifies an HS256 service token. The subject names the calling identity,
 * so a token without one is rejected.
 */
export const verifyServiceJwt = async (
  token: string,
  options: {
    audience: string;
    secret: string;
    issuer?: string;
    requiredScopes?: string[];
  }
): Promise<ServiceCaller> => {
  const key = textEncoder.encode(options.secret);
  const { payload } = await jwtVerify(token, key, {
    audience: options.audience,
    issuer: options.issuer,
    algorithms: ["HS256"]
  });
  if (!payload.exp || !payload.aud || !payload.sub) {
    throw new Error("jwt_missing_required_claims");
  }
  const scopeValue = payload.scope;
  const scopes = Array.isArray(scopeValue)
    ? scopeValue.map(String)
    : typeof scopeValue === "string"
      ? scopeValue.split(" ").filter(Boolean)
      : [];
  if (options.requiredScopes && options.requiredScopes.length > 0) {
    if (!options.requiredScopes.every((scope) => scopes.includes(scope))) {
      throw new Error("jwt_missing_required_scope");
    }
  }
  return { subject: payload.sub, scopes };
};
