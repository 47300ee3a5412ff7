import test from "node:test";
import assert from "node:assert/strict";

import { TOKEN_PATH, closedPortUrl, startUpstreamStub, testConfig, tokenIssuer } from "../testing/upstream-stub.js";
import { AuthenticationError, ConfigurationError, TransportError } from "./errors.js";
import { SessionManager } from "./session.js";

test("getToken posts client credentials as a form body", async (t) => {
  const issue = tokenIssuer();
  const stub = await startUpstreamStub(t, () => issue());
  const session = new SessionManager(testConfig({ apiEndpoint: stub.baseUrl }));

  assert.equal(await session.getToken(), "tok-1");

  assert.equal(stub.requests.length, 1);
  const [request] = stub.requests;
  assert.equal(request.method, "POST");
  assert.equal(request.url.pathname, TOKEN_PATH);
  assert.equal(request.headers["content-type"], "application/x-www-form-urlencoded");
  const form = new URLSearchParams(request.body);
  assert.equal(form.get("grant_type"), "client_credentials");
  assert.equal(form.get("client_id"), "client-1");
  assert.equal(form.get("client_secret"), "test-secret");
});

test("getToken reuses the cached token until five minutes before expiry", async (t) => {
  const issue = tokenIssuer(3600);
  const stub = await startUpstreamStub(t, () => issue());
  const start = 1_700_000_000_000;
  let clock = start;
  const session = new SessionManager(testConfig({ apiEndpoint: stub.baseUrl }), { now: () => clock });

  assert.equal(await session.getToken(), "tok-1");
  assert.equal(session.getTokenExpiry(), start + 3_300_000);

  clock = start + 3_299_999;
  assert.equal(await session.getToken(), "tok-1");
  assert.equal(stub.requests.length, 1);

  clock = start + 3_300_000;
  assert.equal(await session.getToken(), "tok-2");
  assert.equal(await session.getToken(), "tok-2");
  assert.equal(stub.requests.length, 2);
});

test("getToken defaults expires_in to one hour when absent", async (t) => {
  const stub = await startUpstreamStub(t, () => ({ json: { access_token: "tok-x" } }));
  const session = new SessionManager(testConfig({ apiEndpoint: stub.baseUrl }), { now: () => 0 });

  await session.getToken();

  assert.equal(session.getTokenExpiry(), 3_300_000);
});

test("getToken raises AuthenticationError with the upstream status", async (t) => {
  const stub = await startUpstreamStub(t, () => ({ status: 401, json: { error: "invalid_client" } }));
  const session = new SessionManager(testConfig({ apiEndpoint: stub.baseUrl }));

  await assert.rejects(session.getToken(), (error: unknown) => {
    assert.ok(error instanceof AuthenticationError);
    assert.equal(error.statusCode, 401);
    assert.equal(error.message, "Token exchange failed with HTTP 401.");
    return true;
  });
  assert.equal(session.getTokenExpiry(), null);
});

test("a failed token exchange is retried fresh on the next call", async (t) => {
  let attempts = 0;
  const stub = await startUpstreamStub(t, () => {
    attempts++;
    return attempts === 1 ? { status: 500, text: "unavailable" } : { json: { access_token: "tok-after", expires_in: 3600 } };
  });
  const session = new SessionManager(testConfig({ apiEndpoint: stub.baseUrl }));

  await assert.rejects(session.getToken(), AuthenticationError);
  assert.equal(await session.getToken(), "tok-after");
  assert.equal(stub.requests.length, 2);
});

test("getToken rejects a response without access_token", async (t) => {
  const stub = await startUpstreamStub(t, () => ({ json: { token_type: "bearer" } }));
  const session = new SessionManager(testConfig({ apiEndpoint: stub.baseUrl }));

  await assert.rejects(session.getToken(), /Token response missing access_token/);
});

test("getToken raises ConfigurationError before any request when credentials are missing", async (t) => {
  const stub = await startUpstreamStub(t, () => ({ json: {} }));
  const session = new SessionManager(testConfig({ apiEndpoint: stub.baseUrl, clientSecret: undefined }));

  await assert.rejects(session.getToken(), ConfigurationError);
  assert.equal(stub.requests.length, 0);
});

test("getToken surfaces connection failures as TransportError", async () => {
  const session = new SessionManager(testConfig({ apiEndpoint: await closedPortUrl() }));

  await assert.rejects(session.getToken(), (error: unknown) => {
    assert.ok(error instanceof TransportError);
    assert.equal(error.statusCode, 502);
    return true;
  });
});

test("getToken is not available on on-prem deployments", async () => {
  const session = new SessionManager(testConfig({ deployment: "onprem", ddcHost: "https://ddc.example.test" }));

  await assert.rejects(session.getToken(), ConfigurationError);
});

test("getBaseUrl builds the cloud and on-prem OData roots", () => {
  assert.equal(new SessionManager(testConfig({ region: "eu" })).getBaseUrl(), "https://api-eu.cloud.com/monitorodata");
  assert.equal(new SessionManager(testConfig({ region: "nowhere" })).getBaseUrl(), "https://api-us.cloud.com/monitorodata");
  assert.equal(
    new SessionManager(testConfig({ deployment: "onprem", ddcHost: "https://ddc.example.test/" })).getBaseUrl(),
    "https://ddc.example.test/Citrix/Monitor/OData/v4/Data",
  );
});

test("getTokenUrl embeds the customer id", () => {
  const session = new SessionManager(testConfig({ region: "jp" }));

  assert.equal(session.getTokenUrl(), "https://api.citrixcloud.jp/cctrustoauth2/cust-1/tokens/clients");
});

test("cloud session stamps CWSAuth and customer headers on every request", async (t) => {
  const issue = tokenIssuer();
  const stub = await startUpstreamStub(t, (req) => (req.url.pathname === TOKEN_PATH ? issue() : { json: { value: [] } }));
  let clock = 0;
  const session = new SessionManager(testConfig({ apiEndpoint: stub.baseUrl }), { now: () => clock });

  const http = await session.getSession();
  await http.get(`${session.getBaseUrl()}/Machines`);

  clock = 3_300_000;
  await session.refreshIfNeeded();
  assert.equal(await session.getSession(), http);
  await http.get(`${session.getBaseUrl()}/Machines`);

  const [first, second] = stub.dataRequests();
  assert.equal(first.headers.authorization, "CWSAuth bearer=tok-1");
  assert.equal(first.headers["citrix-customerid"], "cust-1");
  assert.equal(first.headers.accept, "application/json");
  assert.equal(second.headers.authorization, "CWSAuth bearer=tok-2");
});

test("on-prem session requires user credentials and a controller host", async () => {
  const noUser = new SessionManager(testConfig({ deployment: "onprem", ddcHost: "https://ddc.example.test" }));
  await assert.rejects(noUser.getSession(), /CITRIX_USERNAME and CITRIX_PASSWORD/);

  const noHost = new SessionManager(testConfig({ deployment: "onprem", username: "monitor", password: "test-password" }));
  await assert.rejects(noHost.getSession(), /CITRIX_DDC_HOST/);
});
