import { StorageError } from "./errors.js";

// pg returns numeric columns as strings; every record below converts them
// to plain numbers before the body is serialized.

export type PaymentStatus = "Pending" | "Paid" | "Cancelled";

export type TutorRow = {
  id_professor: number;
  nome: string;
  valor_hora: string | number;
  nome_materia: string;
};

export type TutorRecord = {
  id_professor: number;
  nome: string;
  valor_hora: number;
  nome_materia: string;
};

export type EngagementRow = {
  id_conexao: number;
  professor: string;
  nome_materia: string;
  horas_contratadas: number | string;
  status: string;
};

export type EngagementRecord = {
  id_conexao: number;
  professor: string;
  nome_materia: string;
  horas_contratadas: number;
  status: string;
};

export type PaymentRow = {
  id_pagamento: number;
  id_conexao: number;
  valor: string | number;
  forma_pagamento: string;
  status_pagamento: string;
};

export type PaymentRecord = {
  id_pagamento: number;
  id_conexao: number;
  valor: number;
  forma_pagamento: string;
  status_pagamento: string;
};

/** Reads a numeric column; a null or non-numeric value means a corrupt row. */
export function toFloat(value: string | number | null | undefined, column: string): number {
  const parsed = typeof value === "number" ? value : typeof value === "string" ? Number.parseFloat(value) : Number.NaN;
  if (!Number.isFinite(parsed)) {
    throw new StorageError("invalid_row", `Column '${column}' holds a non-numeric value.`);
  }
  return parsed;
}

export function toTutorRecord(row: TutorRow): TutorRecord {
  return {
    id_professor: Number(row.id_professor),
    nome: row.nome,
    valor_hora: toFloat(row.valor_hora, "valor_hora"),
    nome_materia: row.nome_materia
  };
}

export function toEngagementRecord(row: EngagementRow): EngagementRecord {
  return {
    id_conexao: Number(row.id_conexao),
    professor: row.professor,
    nome_materia: row.nome_materia,
    horas_contratadas: toFloat(row.horas_contratadas, "horas_contratadas"),
    status: row.status
  };
}

export function toPaymentRecord(row: PaymentRow): PaymentRecord {
  return {
    id_pagamento: Number(row.id_pagamento),
    id_conexao: Number(row.id_conexao),
    valor: toFloat(row.valor, "valor"),
    forma_pagamento: row.forma_pagamento,
    status_pagamento: row.status_pagamento
  };
}
