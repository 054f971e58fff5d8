// CHANGE: Architecture rules as a test, using ts-morph over src/
// WHY: CORE never imports SHELL or APP and performs no IO; only BIN terminates the process
// FORMAT THEOREM: ∀ file ∈ Core: dependencies(file) ⊆ PureModules
// PURITY: SHELL (reads source files via ts-morph)

import { fileURLToPath } from "node:url";

import { Project, type SourceFile, SyntaxKind } from "ts-morph";
import { beforeAll, describe, expect, it } from "vitest";

interface ArchitectureViolation {
	readonly file: string;
	readonly line: number;
	readonly message: string;
}

const SRC = fileURLToPath(new URL("../src/", import.meta.url));

const IMPURE_ACCESS = [
	"console.log",
	"console.error",
	"console.warn",
	"process.exit",
	"process.env",
	"process.argv",
	"process.stdout",
	"process.stderr",
];

const layerOf = (file: SourceFile): string | null => {
	const relative = file.getFilePath().slice(SRC.length);
	const [layer] = relative.split("/");
	return layer === undefined || layer === relative ? null : layer;
};

/**
 * Проверяет, что CORE файлы не импортируют SHELL и APP
 *
 * @invariant ∀ f ∈ Core: imports(f) ∩ (Shell ∪ App) = ∅
 */
function checkCoreImports(
	file: SourceFile,
): readonly ArchitectureViolation[] {
	return file
		.getImportDeclarations()
		.filter((decl) => /\/(shell|app)\//u.test(decl.getModuleSpecifierValue()))
		.map((decl) => ({
			file: file.getFilePath(),
			line: decl.getStartLineNumber(),
			message: `CORE imports ${decl.getModuleSpecifierValue()}`,
		}));
}

/**
 * Property accesses that perform IO or read global process state.
 */
function findAccess(
	file: SourceFile,
	forbidden: readonly string[],
): readonly ArchitectureViolation[] {
	return file
		.getDescendantsOfKind(SyntaxKind.PropertyAccessExpression)
		.filter((node) => forbidden.includes(node.getText()))
		.map((node) => ({
			file: file.getFilePath(),
			line: node.getStartLineNumber(),
			message: `uses ${node.getText()}`,
		}));
}

describe("architecture", () => {
	let files: readonly SourceFile[] = [];

	beforeAll(() => {
		const project = new Project({ skipAddingFilesFromTsConfig: true });
		files = project.addSourceFilesAtPaths(`${SRC}**/*.ts`);
	});

	const inLayer = (layer: string): readonly SourceFile[] =>
		files.filter((file) => layerOf(file) === layer);

	it("finds the layers", () => {
		expect(inLayer("core").length).toBeGreaterThan(0);
		expect(inLayer("shell").length).toBeGreaterThan(0);
		expect(inLayer("app").length).toBeGreaterThan(0);
	});

	it("keeps CORE free of SHELL and APP imports", () => {
		expect(inLayer("core").flatMap(checkCoreImports)).toEqual([]);
	});

	it("keeps CORE free of IO and process state", () => {
		expect(
			inLayer("core").flatMap((file) => findAccess(file, IMPURE_ACCESS)),
		).toEqual([]);
	});

	it("terminates the process only from BIN", () => {
		const offenders = files
			.filter((file) => layerOf(file) !== "bin")
			.flatMap((file) => findAccess(file, ["process.exit"]));
		expect(offenders).toEqual([]);
	});

	it("writes to the console only through the ReportConsole service", () => {
		const offenders = inLayer("app").flatMap((file) =>
			findAccess(file, ["console.log", "console.error", "process.stdout"]),
		);
		expect(offenders).toEqual([]);
	});
});
