// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { writeFileSync } from "node:fs";
import * as XLSX from "xlsx";
import { Logger, type IReconciledAssembly, type IReconciledComponent } from "elca-core";

export type TabularRow = Record<string, string>;

export const PROPERTY_COLUMN_PREFIX = "Property: ";

export class TabularExport {
    /**
     * One row per lifecycle process, or one row per component that has none.
     */
    static componentRows(assemblies: readonly IReconciledAssembly[]): TabularRow[] {
        const rows: TabularRow[] = [];

        for (const assembly of assemblies) {
            const base = assemblyColumns(assembly);
            for (const [name, value] of Object.entries(assembly.properties)) {
                base[`${PROPERTY_COLUMN_PREFIX}${name}`] = value;
            }

            for (const component of assembly.components) {
                const row = { ...base, ...componentColumns(component) };
                if (component.processes.length === 0) {
                    rows.push(row);
                    continue;
                }
                for (const process of component.processes) {
                    rows.push({
                        ...row,
                        "Lifecycle Phase": process.phase,
                        Ratio: process.ratio,
                        "Process Name": process.processName,
                        "Reference Value": process.referenceValue,
                        UUID: process.uuid,
                    });
                }
            }
        }

        return rows;
    }

    static summaryRows(assemblies: readonly IReconciledAssembly[]): TabularRow[] {
        return assemblies.map((assembly) => {
            const row = assemblyColumns(assembly);
            for (const [name, value] of Object.entries(assembly.properties)) {
                row[name] = value;
            }
            const processCount = assembly.components.reduce((sum, x) => sum + x.processes.length, 0);
            row["Component Count"] = String(assembly.components.length);
            row["Process Count"] = String(processCount);
            return row;
        });
    }

    /**
     * Header is the union of all row keys in first-seen order; a row lacking a
     * column leaves its cell empty.
     */
    static toCsv(rows: readonly TabularRow[], delimiter = ","): string {
        const header = TabularExport.header(rows);
        if (header.length === 0) return "";

        const sheet = XLSX.utils.json_to_sheet([...rows], { header });
        return XLSX.utils.sheet_to_csv(sheet, { FS: delimiter });
    }

    static header(rows: readonly TabularRow[]): string[] {
        const columns = new Set<string>();
        for (const row of rows) {
            for (const key of Object.keys(row)) columns.add(key);
        }
        return [...columns];
    }

    static writeCsv(path: string, rows: readonly TabularRow[], delimiter = ",") {
        writeFileSync(path, `${TabularExport.toCsv(rows, delimiter)}\n`, "utf-8");
        Logger.info(`Wrote ${rows.length} rows to ${path}`);
    }
}

function assemblyColumns(assembly: IReconciledAssembly): TabularRow {
    return {
        "Category Code": assembly.categoryCode,
        "Category Name": assembly.categoryName,
        Subcategory: assembly.subcategory ?? "",
        "Bauteil Name": assembly.name,
        "Bauteil URL": assembly.url,
    };
}

function componentColumns(component: IReconciledComponent): TabularRow {
    return {
        "Component Category": component.category,
        "Component Number": component.number ?? "",
        "Component Name": component.name ?? "",
        "Component Status": component.status ?? "",
        "Component Quantity": component.quantity ?? "",
        "Component Lifetime": component.lifetime ?? "",
        "Thickness (m)": component.thickness === undefined ? "" : String(component.thickness),
        "Component UUID": component.componentUuid ?? "",
        "Element UUID": component.elementUuid ?? "",
        "Matched By": component.matchedBy ?? "",
    };
}
