import {mkdtemp, writeFile, rm} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import test from 'ava'
import {UsageError} from '../errors.js'
import {collect, collectMatrixFilter, parsePositiveInt, resolvePipelineFile} from '../utils.js'

// ---------------------------------------------------------------------------
// resolvePipelineFile
// ---------------------------------------------------------------------------

test('resolvePipelineFile: resolves azure-pipelines.yml in directory', async t => {
  const dir = await mkdtemp(join(tmpdir(), 'stepline-test-'))
  try {
    await writeFile(join(dir, 'azure-pipelines.yml'), 'jobs: []')
    const result = await resolvePipelineFile(dir)
    t.is(result, join(dir, 'azure-pipelines.yml'))
  } finally {
    await rm(dir, {recursive: true})
  }
})

test('resolvePipelineFile: resolves pipeline.json in directory', async t => {
  const dir = await mkdtemp(join(tmpdir(), 'stepline-test-'))
  try {
    await writeFile(join(dir, 'pipeline.json'), '{"jobs":[]}')
    const result = await resolvePipelineFile(dir)
    t.is(result, join(dir, 'pipeline.json'))
  } finally {
    await rm(dir, {recursive: true})
  }
})

test('resolvePipelineFile: prefers azure-pipelines.yml over pipeline files', async t => {
  const dir = await mkdtemp(join(tmpdir(), 'stepline-test-'))
  try {
    await writeFile(join(dir, 'azure-pipelines.yml'), 'jobs: []')
    await writeFile(join(dir, 'pipeline.yml'), 'jobs: []')
    await writeFile(join(dir, 'pipeline.yaml'), 'jobs: []')
    const result = await resolvePipelineFile(dir)
    t.is(result, join(dir, 'azure-pipelines.yml'))
  } finally {
    await rm(dir, {recursive: true})
  }
})

test('resolvePipelineFile: prefers yml over yaml and json', async t => {
  const dir = await mkdtemp(join(tmpdir(), 'stepline-test-'))
  try {
    await writeFile(join(dir, 'pipeline.yml'), 'jobs: []')
    await writeFile(join(dir, 'pipeline.yaml'), 'jobs: []')
    await writeFile(join(dir, 'pipeline.json'), '{"jobs":[]}')
    const result = await resolvePipelineFile(dir)
    t.is(result, join(dir, 'pipeline.yml'))
  } finally {
    await rm(dir, {recursive: true})
  }
})

test('resolvePipelineFile: returns file path directly when given a file', async t => {
  const dir = await mkdtemp(join(tmpdir(), 'stepline-test-'))
  try {
    const filePath = join(dir, 'custom.yaml')
    await writeFile(filePath, 'jobs: []')
    const result = await resolvePipelineFile(filePath)
    t.is(result, filePath)
  } finally {
    await rm(dir, {recursive: true})
  }
})

test('resolvePipelineFile: throws when path does not exist', async t => {
  await t.throwsAsync(
    async () => resolvePipelineFile('/nonexistent/path'),
    {instanceOf: UsageError, message: 'Path does not exist: /nonexistent/path'}
  )
})

test('resolvePipelineFile: throws when no pipeline file in directory', async t => {
  const dir = await mkdtemp(join(tmpdir(), 'stepline-test-'))
  try {
    await t.throwsAsync(
      async () => resolvePipelineFile(dir),
      {
        instanceOf: UsageError,
        message: `No pipeline file found in ${dir}. Expected one of: azure-pipelines.yml, pipeline.yml, pipeline.yaml, pipeline.json`
      }
    )
  } finally {
    await rm(dir, {recursive: true})
  }
})

// ---------------------------------------------------------------------------
// Option parsers
// ---------------------------------------------------------------------------

test('collect accumulates repeated values', t => {
  t.deepEqual(collect('Test', collect('Lint', [])), ['Lint', 'Test'])
})

test('collectMatrixFilter splits on the first equals sign', t => {
  t.deepEqual(collectMatrixFilter('python.version=3.7', []), [['python.version', '3.7']])
  t.deepEqual(collectMatrixFilter('flags=a=b', [['os', 'linux']]), [['os', 'linux'], ['flags', 'a=b']])
})

test('collectMatrixFilter rejects values without a variable name', t => {
  t.throws(() => collectMatrixFilter('=3.7', []), {
    instanceOf: UsageError,
    message: 'Invalid matrix filter \'=3.7\': expected <variable>=<value>'
  })
  t.throws(() => collectMatrixFilter('python', []), {instanceOf: UsageError})
})

test('parsePositiveInt accepts positive integers only', t => {
  t.is(parsePositiveInt('4'), 4)
  t.throws(() => parsePositiveInt('0'), {instanceOf: UsageError, message: 'Expected a positive integer, got \'0\''})
  t.throws(() => parsePositiveInt('2.5'), {instanceOf: UsageError})
})
