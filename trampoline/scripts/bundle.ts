#!/usr/bin/env tsx
import { mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
/**
 * Bundle the trampoline into a standalone ESM file that a desktop host can
 * ship next to its own binaries and point GIT_ASKPASS (or similar) at.
 *
 * Everything is bundled; only Node built-ins stay external.
 */
import * as esbuild from 'esbuild'

const __dirname = dirname(fileURLToPath(import.meta.url))
const root = join(__dirname, '..')

function getPackageVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(join(root, 'package.json'), 'utf-8'))
  if (
    typeof manifest === 'object' &&
    manifest !== null &&
    'version' in manifest &&
    typeof manifest.version === 'string'
  ) {
    return manifest.version
  }
  return '0.0.0-unknown'
}

async function bundle() {
  const version = getPackageVersion()
  console.log(`Bundling desktop-trampoline v${version}...`)

  const bundleDir = join(root, 'dist', 'bundle')
  const bundlePath = join(bundleDir, 'desktop-trampoline.mjs')
  mkdirSync(bundleDir, { recursive: true })

  const result = await esbuild.build({
    entryPoints: [join(root, 'src', 'bin', 'trampoline.ts')],
    bundle: true,
    platform: 'node',
    target: 'node20',
    format: 'esm',
    outfile: bundlePath,
    minify: false, // Keep readable for debugging
    sourcemap: false,
    banner: {
      js: `// desktop-trampoline bundle v${version}
// Do not edit directly - regenerate with: npm run bundle
`
    },
    metafile: true
  })

  writeFileSync(join(bundleDir, 'meta.json'), JSON.stringify(result.metafile, null, 2))

  // Exactly one shebang, at the very start, for direct execution
  let bundleContent = readFileSync(bundlePath, 'utf-8')
  bundleContent = bundleContent.replace(/^#!.*\n/gm, '')
  bundleContent = '#!/usr/bin/env node\n' + bundleContent
  writeFileSync(bundlePath, bundleContent, { mode: 0o755 })

  const sizeKB = (Buffer.byteLength(bundleContent) / 1024).toFixed(1)
  console.log(`Bundle created: dist/bundle/desktop-trampoline.mjs (${sizeKB} KB)`)
}

bundle().catch((err) => {
  console.error('Bundle failed:', err)
  process.exit(1)
})
