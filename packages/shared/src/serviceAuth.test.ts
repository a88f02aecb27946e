import { test } from "node:test";
import assert from "node:assert/strict";
import { SignJWT } from "jose";
import { extractBearerToken, verifyServiceJwt } from "./serviceAuth.js";

const secret = "test-secret-test-secret-test-secret";
const audience = "idbridge.service.bridge";

const signToken = (claims: { scope?: string[] | string; subject?: string; audience?: string }) => {
  const builder = new SignJWT(claims.scope === undefined ? {} : { scope: claims.scope })
    .setProtectedHeader({ alg: "HS256" })
    .setAudience(claims.audience ?? audience)
    .setIssuedAt()
    .setExpirationTime("2m")
    .setIssuer("bridge-relayer");
  if (claims.subject) builder.setSubject(claims.subject);
  return builder.sign(new TextEncoder().encode(secret));
};

test("extractBearerToken only accepts the Bearer scheme", () => {
  assert.equal(extractBearerToken("Bearer abc"), "abc");
  assert.equal(extractBearerToken("Basic abc"), null);
  assert.equal(extractBearerToken(undefined), null);
});

test("verifyServiceJwt returns the subject and scopes", async () => {
  const token = await signToken({ scope: "message:receive credential:write", subject: "relayer" });
  const caller = await verifyServiceJwt(token, {
    audience,
    secret,
    issuer: "bridge-relayer",
    requiredScopes: ["message:receive"]
  });
  assert.deepEqual(caller, { subject: "relayer", scopes: ["message:receive", "credential:write"] });
});

test("verifyServiceJwt rejects wrong audience, wrong secret and missing scope", async () => {
  const token = await signToken({ scope: ["message:receive"], subject: "relayer" });
  await assert.rejects(verifyServiceJwt(token, { audience: "other", secret }));
  await assert.rejects(verifyServiceJwt(token, { audience, secret: `${secret}-other` }));
  await assert.rejects(
    verifyServiceJwt(token, { audience, secret, requiredScopes: ["credential:write"] }),
    { message: "jwt_missing_required_scope" }
  );
});

test("verifyServiceJwt requires a subject", async () => {
  const token = await signToken({ scope: ["message:receive"] });
  await assert.rejects(verifyServiceJwt(token, { audience, secret }), {
    message: "jwt_missing_required_claims"
  });
});
