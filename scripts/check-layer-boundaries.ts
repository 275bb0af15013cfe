import { existsSync, readdirSync, readFileSync } from 'node:fs'
import path from 'node:path'
import { pathToFileURL } from 'node:url'
import ts from 'typescript'

/**
 * Inner layers must not reach outward:
 * - core: only itself
 * - shared: core
 * - application: core and shared
 * Infrastructure, config and the composition root in src/app are free.
 */
const LAYER_RULES: ReadonlyArray<{ layer: string; forbidden: readonly string[] }> = [
  { layer: 'core', forbidden: ['shared', 'application', 'infrastructure', 'config', 'app'] },
  { layer: 'shared', forbidden: ['application', 'infrastructure', 'config', 'app'] },
  { layer: 'application', forbidden: ['infrastructure', 'config', 'app'] }
]

export type LayerViolation = {
  importerPath: string
  line: number
  moduleSpecifier: string
  resolvedPath: string
  /** Layer of the importer and the layer it must not import. */
  rule: { layer: string; target: string }
}

type AnalysisResult = {
  violations: LayerViolation[]
}

function walkFiles(rootDir: string, predicate: (filePath: string) => boolean): string[] {
  if (!existsSync(rootDir)) {
    return []
  }

  const stack = [rootDir]
  const output: string[] = []

  for (let currentDir = stack.pop(); currentDir !== undefined; currentDir = stack.pop()) {
    for (const entry of readdirSync(currentDir, { withFileTypes: true })) {
      const fullPath = path.join(currentDir, entry.name)
      if (entry.isDirectory()) {
        stack.push(fullPath)
      } else if (predicate(fullPath)) {
        output.push(fullPath)
      }
    }
  }

  return output.sort()
}

function isTypeScriptFile(filePath: string): boolean {
  return filePath.endsWith('.ts') && !filePath.endsWith('.d.ts')
}

function resolveImportTarget(importerPath: string, moduleSpecifier: string): string | null {
  if (!moduleSpecifier.startsWith('.')) {
    return null
  }

  const unresolved = path.resolve(path.dirname(importerPath), moduleSpecifier)
  const candidates = [
    unresolved.replace(/\.js$/u, '.ts'),
    unresolved,
    `${unresolved}.ts`,
    path.join(unresolved, 'index.ts')
  ]
  return candidates.find((candidate) => existsSync(candidate)) ?? null
}

function isUnderDir(targetPath: string, dirPath: string): boolean {
  const relative = path.relative(dirPath, targetPath)
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative))
}

function moduleSpecifiers(sourceFile: ts.SourceFile): ts.StringLiteral[] {
  const specifiers: ts.StringLiteral[] = []
  for (const statement of sourceFile.statements) {
    if (
      (ts.isImportDeclaration(statement) || ts.isExportDeclaration(statement)) &&
      statement.moduleSpecifier &&
      ts.isStringLiteral(statement.moduleSpecifier)
    ) {
      specifiers.push(statement.moduleSpecifier)
    }
  }
  return specifiers
}

export function analyzeLayerBoundaries(repoRoot: string): AnalysisResult {
  const srcRoot = path.join(repoRoot, 'src')
  const violations: LayerViolation[] = []

  for (const { layer, forbidden } of LAYER_RULES) {
    for (const filePath of walkFiles(path.join(srcRoot, layer), isTypeScriptFile)) {
      const sourceFile = ts.createSourceFile(filePath, readFileSync(filePath, 'utf8'), ts.ScriptTarget.Latest, true)

      for (const specifierNode of moduleSpecifiers(sourceFile)) {
        const resolvedPath = resolveImportTarget(filePath, specifierNode.text)
        if (!resolvedPath) continue

        const target = forbidden.find((name) => isUnderDir(resolvedPath, path.join(srcRoot, name)))
        if (!target) continue

        violations.push({
          importerPath: filePath,
          line: sourceFile.getLineAndCharacterOfPosition(specifierNode.getStart(sourceFile)).line + 1,
          moduleSpecifier: specifierNode.text,
          resolvedPath,
          rule: { layer, target }
        })
      }
    }
  }

  return { violations }
}

function toRelativePath(repoRoot: string, filePath: string): string {
  return path.relative(repoRoot, filePath).replace(/\\/gu, '/')
}

export function runCli(argv: readonly string[] = process.argv.slice(2)): number {
  const rootFlagIndex = argv.indexOf('--root')
  const rootArg = rootFlagIndex >= 0 ? argv[rootFlagIndex + 1] : undefined
  const repoRoot = rootArg ? path.resolve(rootArg) : process.cwd()

  const result = analyzeLayerBoundaries(repoRoot)
  if (result.violations.length === 0) {
    console.log(`No layer boundary violations found for ${LAYER_RULES.map((rule) => `src/${rule.layer}`).join(', ')}.`)
    return 0
  }

  console.error('Disallowed layer imports detected:')
  for (const violation of result.violations) {
    const importerPath = toRelativePath(repoRoot, violation.importerPath)
    const resolvedPath = toRelativePath(repoRoot, violation.resolvedPath)
    console.error(
      `- ${importerPath}:${violation.line} imports "${violation.moduleSpecifier}" (resolved to ${resolvedPath}); ${violation.rule.layer} must not depend on ${violation.rule.target}`
    )
  }
  return 1
}

const isMainModule =
  typeof process.argv[1] === 'string' && import.meta.url === pathToFileURL(process.argv[1]).href

if (isMainModule) {
  process.exitCode = runCli()
}
