import { withApiHandler, type ApiHandlerContext, type ApiResult } from "../lib/apiHandler.js";
import type { DbConnection } from "../lib/db.js";
import { NotFoundError, StorageError, ValidationError } from "../lib/errors.js";
import { readJsonBody } from "../lib/http.js";
import { createCoreRuntime, type Runtime } from "../lib/runtime.js";
import { isOverLength, normalizeCpf, sanitizeString } from "../lib/validators.js";

export type StudentsDeps = Pick<Runtime, "database" | "logger">;

type StudentChanges = {
  nome?: string;
};

/** Fields a student update may touch, with the column each one writes. */
const UPDATABLE_COLUMNS: ReadonlyArray<[keyof StudentChanges, string]> = [["nome", "nome"]];

const NAME_MAX_LENGTH = 160;

function readName(body: Record<string, unknown>): string | null {
  const raw = body.nome ?? body.name;
  if (isOverLength(raw, NAME_MAX_LENGTH)) {
    throw new ValidationError("invalid_name", `Field 'nome' must be at most ${NAME_MAX_LENGTH} characters.`);
  }
  return sanitizeString(raw, NAME_MAX_LENGTH);
}

function requireCpf(body: Record<string, unknown>): string {
  const raw = body.cpf ?? body.national_id;
  if (raw === undefined || raw === null || raw === "") {
    throw new ValidationError("missing_cpf", "Field 'cpf' is required.");
  }

  const cpf = normalizeCpf(raw);
  if (!cpf) throw new ValidationError("invalid_cpf", "Field 'cpf' must contain 11 digits.");
  return cpf;
}

export function buildStudentUpdate(cpf: string, changes: StudentChanges): { sql: string; params: unknown[] } | null {
  const assignments: string[] = [];
  const params: unknown[] = [];

  for (const [field, column] of UPDATABLE_COLUMNS) {
    const value = changes[field];
    if (value === undefined) continue;
    params.push(value);
    assignments.push(`${column} = $${params.length}`);
  }

  if (!assignments.length) return null;

  params.push(cpf);
  return {
    sql: `update alunos set ${assignments.join(", ")} where cpf = $${params.length}`,
    params
  };
}

async function studentExists(conn: DbConnection, cpf: string): Promise<boolean> {
  const { rows } = await conn.query<{ total: string }>("select count(*) as total from alunos where cpf = $1", [cpf]);
  return Number(rows[0]?.total ?? 0) > 0;
}

export function createStudentsHandler(deps: StudentsDeps) {
  async function registerStudent(ctx: ApiHandlerContext): Promise<ApiResult> {
    const body = readJsonBody(ctx.req);

    const name = readName(body);
    if (!name) throw new ValidationError("missing_name", "Field 'nome' is required.");
    const cpf = requireCpf(body);

    const studentId = await deps.database.withConnection(async (conn) => {
      const { rows } = await conn.query<{ id_aluno: number }>(
        "insert into alunos (nome, cpf) values ($1, $2) returning id_aluno",
        [name, cpf]
      );
      const id = rows[0]?.id_aluno;
      if (id === undefined) throw new StorageError("storage_error", "Student insert returned no id.");
      return Number(id);
    });

    ctx.log.info({ studentId }, "student_registered");
    return { statusCode: 201, body: { message: "Student registered successfully.", id_aluno: studentId } };
  }

  async function updateStudent(ctx: ApiHandlerContext): Promise<ApiResult> {
    const body = readJsonBody(ctx.req);
    const cpf = requireCpf(body);

    const changes: StudentChanges = {};
    const name = readName(body);
    if (name) changes.nome = name;

    const update = buildStudentUpdate(cpf, changes);
    if (!update) {
      throw new ValidationError("no_fields_to_update", "At least one updatable field ('nome') is required.");
    }

    await deps.database.withConnection(async (conn) => {
      if (!(await studentExists(conn, cpf))) {
        throw new NotFoundError("student_not_found", "Student not found.");
      }
      await conn.query(update.sql, update.params);
    });

    ctx.log.info({ fields: Object.keys(changes) }, "student_updated");
    return { statusCode: 200, body: { message: "Student updated successfully." } };
  }

  async function studentsHandler(ctx: ApiHandlerContext): Promise<ApiResult> {
    if (ctx.method === "POST") return registerStudent(ctx);
    return updateStudent(ctx);
  }

  return withApiHandler(studentsHandler, { logger: deps.logger, methods: ["POST", "PUT", "PATCH"] });
}

export const handler = createStudentsHandler(createCoreRuntime("students"));
