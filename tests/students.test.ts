import assert from "node:assert/strict";
import test from "node:test";
import { buildStudentUpdate, createStudentsHandler } from "../api/students.js";
import { FakeDatabase, gatewayRequest, parseBody, silentLogger, type Responder } from "./helpers/fakes.js";

function setup(responder?: Responder) {
  const db = new FakeDatabase(responder);
  return { db, handler: createStudentsHandler({ database: db, logger: silentLogger }) };
}

function errorCode(response: { body: string }): unknown {
  const body = parseBody(response);
  return body && typeof body === "object" && "code" in body ? body.code : undefined;
}

test("registration without name or cpf is rejected before touching the database", async () => {
  const { db, handler } = setup();

  const noName = await handler(gatewayRequest("POST", { body: { cpf: "52998224725" } }));
  assert.equal(noName.statusCode, 400);
  assert.equal(errorCode(noName), "missing_name");

  const noCpf = await handler(gatewayRequest("POST", { body: { nome: "Ana Souza" } }));
  assert.equal(noCpf.statusCode, 400);
  assert.equal(errorCode(noCpf), "missing_cpf");

  const badCpf = await handler(gatewayRequest("POST", { body: { nome: "Ana Souza", cpf: "123" } }));
  assert.equal(badCpf.statusCode, 400);
  assert.equal(errorCode(badCpf), "invalid_cpf");

  assert.equal(db.connections, 0);
});

test("registration inserts the student and returns 201", async () => {
  const { db, handler } = setup(() => ({ rows: [{ id_aluno: 5 }] }));

  const response = await handler(gatewayRequest("POST", { body: { nome: "Ana Souza", cpf: "529.982.247-25" } }));

  assert.equal(response.statusCode, 201);
  assert.deepEqual(parseBody(response), { message: "Student registered successfully.", id_aluno: 5 });
  assert.deepEqual(db.calls, [
    {
      text: "insert into alunos (nome, cpf) values ($1, $2) returning id_aluno",
      params: ["Ana Souza", "52998224725"]
    }
  ]);
});

test("an over-long name is rejected on registration and update", async () => {
  const { db, handler } = setup();
  const longName = "A".repeat(161);

  const register = await handler(gatewayRequest("POST", { body: { nome: longName, cpf: "52998224725" } }));
  assert.equal(register.statusCode, 400);
  assert.equal(errorCode(register), "invalid_name");

  const update = await handler(gatewayRequest("PATCH", { body: { nome: longName, cpf: "52998224725" } }));
  assert.equal(update.statusCode, 400);
  assert.equal(errorCode(update), "invalid_name");

  assert.equal(db.connections, 0);
});

test("registration fails when the insert returns no id", async () => {
  const { handler } = setup(() => ({ rows: [] }));

  const response = await handler(gatewayRequest("POST", { body: { nome: "Ana Souza", cpf: "52998224725" } }));

  assert.equal(response.statusCode, 500);
  assert.equal(errorCode(response), "storage_error");
});

test("a duplicate cpf surfaces as a storage error", async () => {
  const { handler } = setup(() => {
    throw Object.assign(new Error('duplicate key value violates unique constraint "alunos_cpf_key"'), {
      code: "23505"
    });
  });

  const response = await handler(gatewayRequest("POST", { body: { nome: "Ana Souza", cpf: "52998224725" } }));

  assert.equal(response.statusCode, 500);
  assert.equal(errorCode(response), "unique_violation");
});

test("update requires cpf and at least one field", async () => {
  const { db, handler } = setup();

  const noCpf = await handler(gatewayRequest("PUT", { body: { nome: "Ana Lima" } }));
  assert.equal(noCpf.statusCode, 400);
  assert.equal(errorCode(noCpf), "missing_cpf");

  const noFields = await handler(gatewayRequest("PUT", { body: { cpf: "52998224725" } }));
  assert.equal(noFields.statusCode, 400);
  assert.equal(errorCode(noFields), "no_fields_to_update");

  assert.equal(db.connections, 0);
});

test("update of an unknown student returns 404 without running the update", async () => {
  const { db, handler } = setup(() => ({ rows: [{ total: "0" }] }));

  const response = await handler(gatewayRequest("PATCH", { body: { cpf: "52998224725", nome: "Ana Lima" } }));

  assert.equal(response.statusCode, 404);
  assert.equal(errorCode(response), "student_not_found");
  assert.equal(db.calls.length, 1);
  assert.equal(db.released, 1);
});

test("update touches only the supplied fields", async () => {
  const { db, handler } = setup((text) => (text.startsWith("select") ? { rows: [{ total: "1" }] } : { rowCount: 1 }));

  const response = await handler(gatewayRequest("PUT", { body: { cpf: "52998224725", nome: "Ana Lima" } }));

  assert.equal(response.statusCode, 200);
  assert.deepEqual(parseBody(response), { message: "Student updated successfully." });
  assert.deepEqual(db.calls[1], {
    text: "update alunos set nome = $1 where cpf = $2",
    params: ["Ana Lima", "52998224725"]
  });
});

test("buildStudentUpdate returns null when nothing changes", () => {
  assert.equal(buildStudentUpdate("52998224725", {}), null);
});

test("students endpoint does not answer GET", async () => {
  const { handler } = setup();
  const response = await handler(gatewayRequest("GET"));
  assert.equal(response.statusCode, 405);
});
