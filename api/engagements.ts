import { withApiHandler, type ApiHandlerContext, type ApiResult } from "../lib/apiHandler.js";
import { StorageError, ValidationError } from "../lib/errors.js";
import { readJsonBody, requireStudentId } from "../lib/http.js";
import { toEngagementRecord, type EngagementRow } from "../lib/records.js";
import { createCoreRuntime, type Runtime } from "../lib/runtime.js";
import { parsePositiveInt } from "../lib/validators.js";

export type EngagementsDeps = Pick<Runtime, "database" | "logger">;

export const ENGAGEMENT_ACTIVE_STATUS = "Active";

const REQUIRED_FIELDS = ["id_professor", "id_aluno", "id_materia", "horas_contratadas"] as const;

type EngagementInput = Record<(typeof REQUIRED_FIELDS)[number], number>;

export function parseEngagementInput(body: Record<string, unknown>): EngagementInput {
  const tutorId = parsePositiveInt(body.id_professor);
  const studentId = parsePositiveInt(body.id_aluno);
  const subjectId = parsePositiveInt(body.id_materia);
  const hours = parsePositiveInt(body.horas_contratadas);

  if (tutorId === null || studentId === null || subjectId === null || hours === null) {
    const invalid = REQUIRED_FIELDS.filter((field) => parsePositiveInt(body[field]) === null);
    throw new ValidationError(
      "invalid_engagement",
      "Fields 'id_professor', 'id_aluno', 'id_materia' and 'horas_contratadas' must be positive integers.",
      { fields: invalid }
    );
  }

  return { id_professor: tutorId, id_aluno: studentId, id_materia: subjectId, horas_contratadas: hours };
}

export function createEngagementsHandler(deps: EngagementsDeps) {
  async function createEngagement(ctx: ApiHandlerContext): Promise<ApiResult> {
    const input = parseEngagementInput(readJsonBody(ctx.req));

    const engagementId = await deps.database.withConnection(async (conn) => {
      const { rows } = await conn.query<{ id_conexao: number }>(
        `insert into conexoes_aluno_prof (id_professor, id_aluno, id_materia, horas_contratadas, status)
         values ($1, $2, $3, $4, $5)
         returning id_conexao`,
        [input.id_professor, input.id_aluno, input.id_materia, input.horas_contratadas, ENGAGEMENT_ACTIVE_STATUS]
      );
      const id = rows[0]?.id_conexao;
      if (id === undefined) throw new StorageError("storage_error", "Engagement insert returned no id.");
      return Number(id);
    });

    ctx.log.info({ engagementId, studentId: input.id_aluno }, "engagement_created");
    return { statusCode: 201, body: { message: "Engagement created successfully.", id_conexao: engagementId } };
  }

  async function listEngagements(ctx: ApiHandlerContext): Promise<ApiResult> {
    const studentId = requireStudentId(ctx.req);

    const rows = await deps.database.withConnection(async (conn) => {
      const { rows } = await conn.query<EngagementRow>(
        `select c.id_conexao, p.nome as professor, m.nome_materia, c.horas_contratadas, c.status
           from conexoes_aluno_prof c
           join professores p on p.id_professor = c.id_professor
           join materias m on m.id_materia = c.id_materia
          where c.id_aluno = $1
          order by c.id_conexao`,
        [studentId]
      );
      return rows;
    });

    ctx.log.info({ studentId, count: rows.length }, "engagements_listed");
    return { statusCode: 200, body: rows.map(toEngagementRecord) };
  }

  async function engagementsHandler(ctx: ApiHandlerContext): Promise<ApiResult> {
    if (ctx.method === "GET") return listEngagements(ctx);
    return createEngagement(ctx);
  }

  return withApiHandler(engagementsHandler, { logger: deps.logger, methods: ["GET", "POST"] });
}

export const handler = createEngagementsHandler(createCoreRuntime("engagements"));
