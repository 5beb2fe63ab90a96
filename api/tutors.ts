import { withApiHandler, type ApiHandlerContext, type ApiResult } from "../lib/apiHandler.js";
import { ValidationError } from "../lib/errors.js";
import { getQueryParam } from "../lib/http.js";
import { toTutorRecord, type TutorRow } from "../lib/records.js";
import { createCoreRuntime, type Runtime } from "../lib/runtime.js";
import { isOverLength, sanitizeString } from "../lib/validators.js";

export type TutorsDeps = Pick<Runtime, "database" | "logger">;

const SUBJECT_MAX_LENGTH = 120;

export function buildTutorSearchQuery(subject: string | null): { sql: string; params: unknown[] } {
  const params: unknown[] = [];
  let sql = `
    select p.id_professor, p.nome, p.valor_hora, m.nome_materia
      from professores p
      join conexao_prof_materias cpm on cpm.id_professor = p.id_professor
      join materias m on m.id_materia = cpm.id_materia`;

  if (subject) {
    params.push(subject);
    sql += `
     where m.nome_materia = $${params.length}`;
  }

  sql += `
     order by p.id_professor, m.nome_materia`;

  return { sql, params };
}

export function createTutorsHandler(deps: TutorsDeps) {
  async function searchTutors(ctx: ApiHandlerContext): Promise<ApiResult> {
    const raw = getQueryParam(ctx.req, "materia", "subject");
    if (isOverLength(raw, SUBJECT_MAX_LENGTH)) {
      throw new ValidationError("invalid_subject", `Subject filter must be at most ${SUBJECT_MAX_LENGTH} characters.`);
    }
    const subject = sanitizeString(raw, SUBJECT_MAX_LENGTH);
    const { sql, params } = buildTutorSearchQuery(subject);

    const rows = await deps.database.withConnection(async (conn) => {
      const { rows } = await conn.query<TutorRow>(sql, params);
      return rows;
    });

    ctx.log.info({ subject, count: rows.length }, "tutors_searched");
    return { statusCode: 200, body: rows.map(toTutorRecord) };
  }

  return withApiHandler(searchTutors, { logger: deps.logger, methods: ["GET"] });
}

export const handler = createTutorsHandler(createCoreRuntime("tutors"));
