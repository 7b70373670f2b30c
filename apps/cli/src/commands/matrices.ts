import { Command } from "commander";
import type { PayoffMatrix } from "@brinksmanship/core";
import { buildDefaultMatrix, listMatrixTypes } from "@brinksmanship/matrices";

function formatPayoffs(matrix: PayoffMatrix): string[] {
  const [rowC, rowD] = matrix.rowLabels;
  const [colC, colD] = matrix.colLabels;
  const cell = (a: number, b: number) => `(${a.toFixed(2)}, ${b.toFixed(2)})`.padEnd(16);
  const width = Math.max(rowC.length, rowD.length);
  return [
    `${"".padEnd(width)}  ${colC.padEnd(16)}${colD}`,
    `${rowC.padEnd(width)}  ${cell(matrix.cc.payoffA, matrix.cc.payoffB)}${cell(matrix.cd.payoffA, matrix.cd.payoffB)}`,
    `${rowD.padEnd(width)}  ${cell(matrix.dc.payoffA, matrix.dc.payoffB)}${cell(matrix.dd.payoffA, matrix.dd.payoffB)}`,
  ];
}

export function registerMatricesCommand(program: Command): void {
  program
    .command("matrices")
    .description("List the matrix catalogue with aliases and default payoffs")
    .action(() => {
      for (const info of listMatrixTypes()) {
        console.log(`\n${info.name} (${info.matrixType}) [${info.category}]`);
        if (info.aliases.length > 0) {
          console.log(`  Aliases: ${info.aliases.join(", ")}`);
        }
        for (const line of formatPayoffs(buildDefaultMatrix(info.matrixType))) {
          console.log(`  ${line}`);
        }
      }
    });
}
