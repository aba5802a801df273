/**
 * Basic HTTP Example
 *
 * Stubs a user API, exercises it with fetch and verifies the calls.
 */

import { exactly, MockServer, present } from "httpdouble";

interface User {
	id: number;
	name: string;
	email: string;
}

const server = new MockServer({ logLevel: "info" });

server.requirements((r) => {
	r.all().header("authorization", present());
});

server.expectations((e) => {
	e.get("/users/*")
		.respond({ status: 503 })
		.respond({ status: 200, body: { id: 1, name: "Alice", email: "alice@example.com" } satisfies User })
		.times(exactly(2));

	e.post("/users")
		.body<Partial<User>>((user) => typeof user.name === "string", { description: "has a name" })
		.respond({ status: 201, body: { id: 2, name: "Bob", email: "bob@example.com" } satisfies User });
});

await server.start();

const headers = { authorization: "Bearer test-token", "content-type": "application/json" };
const first = await fetch(`${server.url}/users/1`, { headers });
const second = await fetch(`${server.url}/users/1`, { headers });
const created = await fetch(`${server.url}/users`, {
	method: "POST",
	headers,
	body: JSON.stringify({ name: "Bob" }),
});

console.log("statuses:", first.status, second.status, created.status);
console.log("verified:", await server.verify(1000));
console.table(server.verificationReport());

await server.close();
