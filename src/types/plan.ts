// src/types/plan.ts

export type TablePlan = {
  table: string;
  source: "reference" | "generated";
  rowCount: number;
};

export type GenerationPlan = {
  seed: number;
  tableOrder: string[];
  tablePlans: Map<string, TablePlan>;
};
