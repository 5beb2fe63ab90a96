import assert from "node:assert/strict";
import test from "node:test";
import { createEngagementsHandler } from "../api/engagements.js";
import { FakeDatabase, gatewayRequest, parseBody, silentLogger, type Responder } from "./helpers/fakes.js";

function setup(responder?: Responder) {
  const db = new FakeDatabase(responder);
  return { db, handler: createEngagementsHandler({ database: db, logger: silentLogger }) };
}

test("engagement creation rejects missing or non-numeric fields without inserting", async () => {
  const { db, handler } = setup();

  const missingHours = await handler(
    gatewayRequest("POST", { body: { id_professor: 2, id_aluno: 3, id_materia: 4 } })
  );
  assert.equal(missingHours.statusCode, 400);
  assert.deepEqual(parseBody(missingHours), {
    code: "invalid_engagement",
    error: "invalid_engagement",
    message: "Fields 'id_professor', 'id_aluno', 'id_materia' and 'horas_contratadas' must be positive integers.",
    requestId: "req-test",
    details: { fields: ["horas_contratadas"] }
  });

  const nonNumeric = await handler(
    gatewayRequest("POST", { body: { id_professor: "abc", id_aluno: 3, id_materia: 4, horas_contratadas: 0 } })
  );
  assert.equal(nonNumeric.statusCode, 400);

  const emptyBody = await handler(gatewayRequest("POST"));
  assert.equal(emptyBody.statusCode, 400);

  assert.equal(db.connections, 0);
});

test("engagement creation inserts an Active row and returns its id", async () => {
  const { db, handler } = setup(() => ({ rows: [{ id_conexao: 9 }] }));

  const response = await handler(
    gatewayRequest("POST", { body: { id_professor: "2", id_aluno: 3, id_materia: "4", horas_contratadas: 10 } })
  );

  assert.equal(response.statusCode, 201);
  assert.deepEqual(parseBody(response), { message: "Engagement created successfully.", id_conexao: 9 });
  assert.deepEqual(db.calls[0]?.params, [2, 3, 4, 10, "Active"]);
});

test("engagement creation fails when the insert returns no id", async () => {
  const { handler } = setup(() => ({ rows: [] }));

  const response = await handler(
    gatewayRequest("POST", { body: { id_professor: 2, id_aluno: 3, id_materia: 4, horas_contratadas: 10 } })
  );

  assert.equal(response.statusCode, 500);
  assert.deepEqual(parseBody(response), {
    code: "storage_error",
    error: "storage_error",
    message: "Engagement insert returned no id.",
    requestId: "req-test"
  });
});

test("hex, exponent and binary ids are rejected", async () => {
  const { db, handler } = setup();

  const response = await handler(
    gatewayRequest("POST", { body: { id_professor: "0x2", id_aluno: "1e1", id_materia: "0b11", horas_contratadas: "  5  " } })
  );

  assert.equal(response.statusCode, 400);
  const body = parseBody(response);
  assert.deepEqual(body && typeof body === "object" && "details" in body ? body.details : undefined, {
    fields: ["id_professor", "id_aluno", "id_materia"]
  });
  assert.equal(db.connections, 0);
});

test("a student id beyond the integer range is a validation error", async () => {
  const { db, handler } = setup(() => ({ rows: [] }));

  const response = await handler(gatewayRequest("GET", { query: { id_aluno: "2147483648" } }));

  assert.equal(response.statusCode, 400);
  assert.equal(db.connections, 0);
});

test("a student with no engagements gets 200 and an empty list", async () => {
  const { db, handler } = setup(() => ({ rows: [] }));

  const response = await handler(gatewayRequest("GET", { query: { id_aluno: "3" } }));

  assert.equal(response.statusCode, 200);
  assert.equal(response.body, "[]");
  assert.deepEqual(db.calls[0]?.params, [3]);
});

test("engagements are listed as typed records", async () => {
  const { handler } = setup(() => ({
    rows: [{ id_conexao: 9, professor: "Ana", nome_materia: "Math", horas_contratadas: 10, status: "Active" }]
  }));

  const response = await handler(gatewayRequest("GET", { query: { id_aluno: "3" } }));

  assert.deepEqual(parseBody(response), [
    { id_conexao: 9, professor: "Ana", nome_materia: "Math", horas_contratadas: 10, status: "Active" }
  ]);
});

test("listing without id_aluno is a validation error", async () => {
  const { db, handler } = setup();

  const response = await handler(gatewayRequest("GET"));

  assert.equal(response.statusCode, 400);
  assert.equal(db.connections, 0);
});
