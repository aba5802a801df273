/**
 * Proxy Mode Example
 *
 * One mock server relays a path to another, recording both sides.
 */

import { MockServer } from "httpdouble";

const upstream = new MockServer();
upstream.expectations((e) => {
	e.get("/api/orders").respond({ body: [{ id: 1 }], headers: { "set-cookie": "session=test-session" } });
});
await upstream.start();

const front = new MockServer();
front.expectations((e) => {
	e.get("/orders").forwardTo(`${upstream.url}/api`, { headers: { "X-Forwarded-By": "httpdouble" } });
	e.get("/health").respond({ body: { ok: true } });
});
await front.start();

const res = await fetch(`${front.url}/orders`);
console.log(res.status, await res.json(), res.headers.getSetCookie());

const [relayed] = upstream.receivedRequests();
console.log("upstream saw:", relayed?.request.headers["x-forwarded-by"]);

await Promise.all([front.close(), upstream.close()]);
