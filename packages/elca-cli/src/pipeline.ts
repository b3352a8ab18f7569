// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { existsSync, mkdirSync, readdirSync, statSync } from "node:fs";
import { basename, dirname, extname, join, relative } from "node:path";
import {
    Logger,
    Result,
    countComponents,
    errorMessage,
    type IAssemblyRecord,
    type IReconciledAssembly,
} from "elca-core";
import {
    ProjectXmlReader,
    Reconciler,
    ReportScraper,
    TabularExport,
    XmlLayerLookup,
    type MatchStrategy,
} from "elca-report";
import {
    IFC_FILE_EXTENSION,
    IfcLibraryImporter,
    IfcLibraryService,
    type IAssemblyFailure,
    type IIfcLibraryOptions,
} from "ifc-library-core";
import { DEFAULT_CONFIG, provenanceOf, type IElcaConfig } from "./config";

export const CSV_EXTENSION = ".csv";
export const SUMMARY_CSV_EXTENSION = ".summary.csv";
export const XML_EXTENSION = ".xml";
export const MERGED_IFC_EXTENSION = ".merged.ifc";

const REPORT_EXTENSIONS = new Set([".html", ".htm"]);

export interface IExtractOptions {
    /** Project export; defaults to `<report stem>.xml` beside the report when that file exists. */
    xmlPath?: string;
    strategy?: MatchStrategy;
}

export interface IExtraction {
    assemblies: IReconciledAssembly[];
    assemblyCount: number;
    componentCount: number;
    xmlPath?: string;
    xmlError?: string;
}

export interface IBuildOptions {
    libraryName?: string;
    config?: IElcaConfig;
}

export interface IBuiltLibrary {
    path: string;
    layerSetCount: number;
    failures: IAssemblyFailure[];
}

export interface IImportedLibrary {
    path: string;
    imported: string[];
    skipped: string[];
}

export interface IExportedTables {
    csvPath: string;
    summaryPath?: string;
    rowCount: number;
}

export interface IProcessOptions {
    config?: IElcaConfig;
    xmlPath?: string;
    outputPath?: string;
    libraryName?: string;
    /** Write the component table beside the library. */
    csv?: boolean;
    /** Write the per-assembly summary table beside the library. */
    summary?: boolean;
}

export interface IProcessedReport {
    reportPath: string;
    ifcPath: string;
    csvPath?: string;
    summaryPath?: string;
    assemblyCount: number;
    componentCount: number;
    layerSetCount: number;
    failures: IAssemblyFailure[];
    xmlError?: string;
}

export interface IDirectoryOptions extends Omit<IProcessOptions, "xmlPath" | "outputPath" | "libraryName"> {
    recursive?: boolean;
    /** Outputs go here, mirroring the input tree; defaults to beside each report. */
    outputDirectory?: string;
}

export interface IDirectoryEntry {
    reportPath: string;
    result: Result<IProcessedReport>;
}

export interface IProcessedDirectory {
    entries: IDirectoryEntry[];
    succeeded: number;
    failed: number;
}

export function withExtension(path: string, extension: string): string {
    const ext = extname(path);
    return join(dirname(path), `${basename(path, ext)}${extension}`);
}

export function companionXmlPath(reportPath: string): string {
    return withExtension(reportPath, XML_EXTENSION);
}

/**
 * Reads a report and, when available, reconciles it with its project export.
 * A missing report fails; a broken export only sets `xmlError`.
 */
export function extractAssemblies(htmlPath: string, options: IExtractOptions = {}): Result<IExtraction> {
    let assemblies: IAssemblyRecord[];
    try {
        assemblies = ReportScraper.parseFile(htmlPath);
    } catch (e) {
        return Result.err(errorMessage(e));
    }

    const extraction: IExtraction = {
        assemblies: Reconciler.merge(assemblies, new XmlLayerLookup()),
        assemblyCount: assemblies.length,
        componentCount: countComponents(assemblies),
    };

    const xmlPath = options.xmlPath ?? companionXmlPath(htmlPath);
    if (options.xmlPath === undefined && !existsSync(xmlPath)) {
        Logger.debug(`No project export beside ${htmlPath}`);
        return Result.ok(extraction);
    }

    extraction.xmlPath = xmlPath;
    try {
        const lookup = ProjectXmlReader.parseFile(xmlPath);
        extraction.assemblies = Reconciler.merge(assemblies, lookup, { strategy: options.strategy ?? "name" });
    } catch (e) {
        extraction.xmlError = errorMessage(e);
        Logger.error(`Ignoring project export ${xmlPath}: ${extraction.xmlError}`);
    }

    return Result.ok(extraction);
}

export function buildLibrary(
    assemblies: readonly IReconciledAssembly[],
    outputPath: string,
    options: IBuildOptions = {},
): Result<IBuiltLibrary> {
    const config = options.config ?? DEFAULT_CONFIG;
    const libraryOptions: IIfcLibraryOptions = {
        libraryName: options.libraryName ?? basename(outputPath, extname(outputPath)),
        libraryVersion: config.libraryVersion,
        projectName: config.projectName,
        provenance: provenanceOf(config),
        fileName: basename(outputPath),
    };

    return Result.from(() => {
        const library = IfcLibraryService.build(assemblies, libraryOptions);
        IfcLibraryService.write(outputPath, library.content);
        Logger.info(`Wrote ${library.layerSets.length} material layer sets to ${outputPath}`);
        return {
            path: outputPath,
            layerSetCount: library.layerSets.length,
            failures: library.failures,
        };
    });
}

/**
 * Copies the layer sets of a library file into a target file, writing the
 * merged document to `outputPath`. Sets already named in the target are skipped.
 */
export function importLibrary(
    libraryPath: string,
    targetPath: string,
    outputPath: string,
    config: IElcaConfig = DEFAULT_CONFIG,
): Result<IImportedLibrary> {
    if (!existsSync(libraryPath)) return Result.err(`Library file not found: ${libraryPath}`);
    if (!existsSync(targetPath)) return Result.err(`Target file not found: ${targetPath}`);

    return Result.from(() => {
        const merged = IfcLibraryImporter.merge(IfcLibraryService.read(libraryPath), IfcLibraryService.read(targetPath), {
            fileName: basename(outputPath),
            provenance: provenanceOf(config),
        });
        IfcLibraryService.write(outputPath, merged.content);
        Logger.info(`Imported ${merged.imported.length} material layer sets into ${outputPath}`);
        return { path: outputPath, imported: merged.imported, skipped: merged.skipped };
    });
}

export function exportTables(
    assemblies: readonly IReconciledAssembly[],
    csvPath: string,
    summaryPath?: string,
    delimiter = DEFAULT_CONFIG.csvDelimiter,
): Result<IExportedTables> {
    return Result.from(() => {
        const rows = TabularExport.componentRows(assemblies);
        TabularExport.writeCsv(csvPath, rows, delimiter);
        if (summaryPath !== undefined) {
            TabularExport.writeCsv(summaryPath, TabularExport.summaryRows(assemblies), delimiter);
        }
        return { csvPath, ...(summaryPath !== undefined ? { summaryPath } : {}), rowCount: rows.length };
    });
}

export function processReport(htmlPath: string, options: IProcessOptions = {}): Result<IProcessedReport> {
    const config = options.config ?? DEFAULT_CONFIG;

    const extraction = extractAssemblies(htmlPath, {
        ...(options.xmlPath !== undefined ? { xmlPath: options.xmlPath } : {}),
        strategy: config.matchStrategy,
    });
    if (!extraction.isOk) return extraction;
    const { assemblies, assemblyCount, componentCount, xmlError } = extraction.value;

    const ifcPath = options.outputPath ?? withExtension(htmlPath, IFC_FILE_EXTENSION);
    const library = buildLibrary(assemblies, ifcPath, {
        config,
        ...(options.libraryName !== undefined ? { libraryName: options.libraryName } : {}),
    });
    if (!library.isOk) return library;

    const processed: IProcessedReport = {
        reportPath: htmlPath,
        ifcPath,
        assemblyCount,
        componentCount,
        layerSetCount: library.value.layerSetCount,
        failures: library.value.failures,
        ...(xmlError !== undefined ? { xmlError } : {}),
    };

    if (options.csv || options.summary) {
        const csvPath = withExtension(ifcPath, CSV_EXTENSION);
        const summaryPath = options.summary ? withExtension(ifcPath, SUMMARY_CSV_EXTENSION) : undefined;
        const tables = exportTables(assemblies, csvPath, summaryPath, config.csvDelimiter);
        if (!tables.isOk) return tables;
        processed.csvPath = tables.value.csvPath;
        if (tables.value.summaryPath !== undefined) processed.summaryPath = tables.value.summaryPath;
    }

    return Result.ok(processed);
}

/**
 * Processes every report in a directory one after the other. A failing report
 * is recorded and does not stop the others.
 */
export function processDirectory(directory: string, options: IDirectoryOptions = {}): Result<IProcessedDirectory> {
    if (!existsSync(directory) || !statSync(directory).isDirectory()) {
        return Result.err(`Directory not found: ${directory}`);
    }

    const reports = findReports(directory, options.recursive ?? false);
    if (reports.length === 0) {
        return Result.err(`No HTML reports found in ${directory}`);
    }

    const entries: IDirectoryEntry[] = [];
    for (const reportPath of reports) {
        const outputPath = options.outputDirectory
            ? withExtension(join(options.outputDirectory, relative(directory, reportPath)), IFC_FILE_EXTENSION)
            : undefined;
        const prepared = outputPath
            ? Result.from(() => mkdirSync(dirname(outputPath), { recursive: true }))
            : Result.ok(undefined);

        const result = prepared.isOk
            ? processReport(reportPath, { ...options, ...(outputPath !== undefined ? { outputPath } : {}) })
            : prepared;
        if (result.isOk) {
            Logger.info(`Processed ${reportPath} -> ${result.value.ifcPath}`);
        } else {
            Logger.error(`Failed to process ${reportPath}: ${result.error}`);
        }
        entries.push({ reportPath, result });
    }

    const succeeded = entries.filter((x) => x.result.isOk).length;
    Logger.info(`Processed ${succeeded} reports successfully, ${entries.length - succeeded} with errors`);
    return Result.ok({ entries, succeeded, failed: entries.length - succeeded });
}

function findReports(directory: string, recursive: boolean): string[] {
    return readdirSync(directory, { encoding: "utf-8", recursive })
        .map((entry) => join(directory, entry))
        .filter((path) => REPORT_EXTENSIONS.has(extname(path).toLowerCase()) && statSync(path).isFile())
        .sort();
}
