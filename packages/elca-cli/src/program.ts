// Part of the Chili3d Project, under the AGPL-3.0 License.
// See LICENSE file in the project root for full license information.

import { Command, Option } from "commander";
import { Logger, errorMessage, type Err, type Result } from "elca-core";
import { IfcLibraryService } from "ifc-library-core";
import {
    LOG_LEVEL_NAMES,
    MATCH_STRATEGIES,
    applyLogLevel,
    isLogLevelName,
    isMatchStrategy,
    loadConfig,
    type IElcaConfig,
} from "./config";
import {
    MERGED_IFC_EXTENSION,
    importLibrary,
    processDirectory,
    processReport,
    withExtension,
} from "./pipeline";

interface IGlobalFlags {
    config?: string;
    logLevel?: string;
    organization?: string;
    author?: string;
    projectName?: string;
    libraryVersion?: string;
    match?: string;
    delimiter?: string;
}

interface IExtractFlags {
    xml?: string;
    output?: string;
    libraryName?: string;
    csv?: boolean;
    summary?: boolean;
}

interface IBatchFlags {
    output?: string;
    recursive?: boolean;
    csv?: boolean;
    summary?: boolean;
}

interface IImportFlags {
    output?: string;
}

export interface IProgramIO {
    out: (line: string) => void;
    setExitCode: (code: number) => void;
}

const defaultIO: IProgramIO = {
    out: (line) => console.log(line),
    setExitCode: (code) => {
        process.exitCode = code;
    },
};

/**
 * Command line interface: `extract` one report, `batch` a directory, `list` the
 * layer sets of a library and `import` a library into another IFC file.
 */
export function createProgram(io: IProgramIO = defaultIO): Command {
    const program = new Command();

    program
        .name("elca-library")
        .description("Creates IFC material libraries from eLCA component reports")
        .option("-c, --config <path>", "JSON settings file")
        .addOption(new Option("--log-level <level>", "log verbosity").choices(LOG_LEVEL_NAMES))
        .option("--organization <name>", "organization written into the library provenance")
        .option("--author <family,given>", "person written into the library provenance")
        .option("--project-name <name>", "name of the IFC project")
        .option("--library-version <version>", "version of the library information")
        .addOption(new Option("--match <strategy>", "how report components find project export data").choices(MATCH_STRATEGIES))
        .option("--delimiter <char>", "CSV delimiter");

    const settings = (): IElcaConfig | undefined => {
        const result = resolveConfig(program.opts<IGlobalFlags>());
        if (!result.isOk) {
            Logger.error(result.error);
            io.setExitCode(1);
            return undefined;
        }
        applyLogLevel(result.value);
        return result.value;
    };

    program
        .command("extract")
        .description("build an IFC material library from one report")
        .argument("<report>", "eLCA HTML report")
        .option("-x, --xml <path>", "project export (default: <report>.xml when present)")
        .option("-o, --output <path>", "IFC output (default: <report>.ifc)")
        .option("--library-name <name>", "name of the library information")
        .option("--csv", "also write the component table")
        .option("--summary", "also write the component table and the assembly summary")
        .action((report: string, flags: IExtractFlags) => {
            const config = settings();
            if (!config) return;

            const result = processReport(report, {
                config,
                ...definedFlags(flags),
            });
            if (!result.isOk) {
                fail(io, result);
                return;
            }

            const processed = result.value;
            io.out(`${processed.assemblyCount} assemblies, ${processed.componentCount} components`);
            io.out(`Library: ${processed.ifcPath} (${processed.layerSetCount} layer sets)`);
            if (processed.csvPath) io.out(`Components: ${processed.csvPath}`);
            if (processed.summaryPath) io.out(`Summary: ${processed.summaryPath}`);
            if (processed.xmlError) io.out(`Project export ignored: ${processed.xmlError}`);
            for (const failure of processed.failures) {
                io.out(`Skipped assembly ${failure.assembly}: ${failure.error}`);
            }
        });

    program
        .command("batch")
        .description("build a library for every report in a directory")
        .argument("<directory>", "directory holding eLCA HTML reports")
        .option("-o, --output <directory>", "output directory (default: beside each report)")
        .option("-r, --recursive", "include subdirectories")
        .option("--csv", "also write component tables")
        .option("--summary", "also write component tables and assembly summaries")
        .action((directory: string, flags: IBatchFlags) => {
            const config = settings();
            if (!config) return;

            const result = processDirectory(directory, {
                config,
                recursive: flags.recursive ?? false,
                csv: flags.csv ?? false,
                summary: flags.summary ?? false,
                ...(flags.output !== undefined ? { outputDirectory: flags.output } : {}),
            });
            if (!result.isOk) {
                fail(io, result);
                return;
            }

            for (const entry of result.value.entries) {
                io.out(entry.result.isOk ? `ok ${entry.reportPath}` : `failed ${entry.reportPath}: ${entry.result.error}`);
            }
            io.out(`${result.value.succeeded} succeeded, ${result.value.failed} failed`);
            if (result.value.failed > 0) io.setExitCode(1);
        });

    program
        .command("list")
        .description("list the material layer sets of an IFC file")
        .argument("<library>", "IFC file")
        .action((library: string) => {
            if (!settings()) return;

            let text: string;
            try {
                text = IfcLibraryService.readText(library);
            } catch (e) {
                Logger.error(`Cannot read ${library}: ${errorMessage(e)}`);
                io.setExitCode(1);
                return;
            }

            for (const set of IfcLibraryService.layerSets(text)) {
                const layers = set.layers.map((x) => `${x.name} ${x.thickness} m`).join(", ");
                io.out(`${set.name}: ${layers}`);
            }
        });

    program
        .command("import")
        .description("copy the layer sets of a library into another IFC file")
        .argument("<library>", "IFC material library")
        .argument("<target>", "IFC file receiving the layer sets")
        .option("-o, --output <path>", "merged output (default: <target>.merged.ifc)")
        .action((library: string, target: string, flags: IImportFlags) => {
            const config = settings();
            if (!config) return;

            const output = flags.output ?? withExtension(target, MERGED_IFC_EXTENSION);
            const result = importLibrary(library, target, output, config);
            if (!result.isOk) {
                fail(io, result);
                return;
            }

            io.out(`Imported ${result.value.imported.length}, skipped ${result.value.skipped.length} existing`);
            io.out(`Written to ${result.value.path}`);
        });

    return program;
}

export function resolveConfig(flags: IGlobalFlags, env: NodeJS.ProcessEnv = process.env): Result<IElcaConfig> {
    const overrides: Partial<IElcaConfig> = {};

    if (flags.organization !== undefined) overrides.organization = flags.organization;
    if (flags.projectName !== undefined) overrides.projectName = flags.projectName;
    if (flags.libraryVersion !== undefined) overrides.libraryVersion = flags.libraryVersion;
    if (flags.delimiter !== undefined) overrides.csvDelimiter = flags.delimiter;
    if (isMatchStrategy(flags.match)) overrides.matchStrategy = flags.match;
    if (isLogLevelName(flags.logLevel)) overrides.logLevel = flags.logLevel;
    if (flags.author !== undefined) {
        const [family, given] = flags.author.split(",").map((x) => x.trim());
        if (family) overrides.personFamilyName = family;
        if (given) overrides.personGivenName = given;
    }

    return loadConfig({
        ...(flags.config !== undefined ? { configPath: flags.config } : {}),
        overrides,
        env,
    });
}

function definedFlags(flags: IExtractFlags) {
    return {
        ...(flags.xml !== undefined ? { xmlPath: flags.xml } : {}),
        ...(flags.output !== undefined ? { outputPath: flags.output } : {}),
        ...(flags.libraryName !== undefined ? { libraryName: flags.libraryName } : {}),
        csv: flags.csv ?? false,
        summary: flags.summary ?? false,
    };
}

function fail(io: IProgramIO, result: Err<string>) {
    Logger.error(result.error);
    io.setExitCode(1);
}
