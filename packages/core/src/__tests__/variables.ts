import test from 'ava'
import {JobEnvironment, expandMacros, toEnvName} from '../variables.js'

test('toEnvName uppercases and replaces non-word characters', t => {
  t.is(toEnvName('python.version'), 'PYTHON_VERSION')
  t.is(toEnvName('Build.BuildId'), 'BUILD_BUILDID')
  t.is(toEnvName('my-var'), 'MY_VAR')
})

test('expandMacros leaves undefined macros as written', t => {
  t.is(expandMacros('pip install pkg==$(version) $(missing)', {version: '1.0'}), 'pip install pkg==1.0 $(missing)')
})

test('JobEnvironment exports variables and expands earlier references', t => {
  const environment = new JobEnvironment({PATH: '/bin'}, {a: '1', b: '$(a)-2'})
  t.deepEqual(environment.variables, {a: '1', b: '1-2'})
  t.deepEqual(environment.env, {PATH: '/bin', A: '1', B: '1-2'})
})

test('JobEnvironment.forStep layers step env without changing the job env', t => {
  const environment = new JobEnvironment({}, {a: '1'})
  const stepEnv = environment.forStep({LOCAL: 'value-$(a)'})
  t.is(stepEnv.LOCAL, 'value-1')
  t.false('LOCAL' in environment.env)
})

test('JobEnvironment.apply adds task variables and raw env entries', t => {
  const environment = new JobEnvironment({PATH: '/bin'})
  environment.apply({variables: {pythonLocation: '/tools/Python/3.8.10/x64'}, env: {PATH: '/tools/bin:/bin'}})
  t.is(environment.expand('$(pythonLocation)/bin'), '/tools/Python/3.8.10/x64/bin')
  t.deepEqual(environment.env, {PATH: '/tools/bin:/bin', PYTHONLOCATION: '/tools/Python/3.8.10/x64'})
})

test('JobEnvironment copies the base environment', t => {
  const base = {PATH: '/bin'}
  const environment = new JobEnvironment(base)
  environment.setEnv('PATH', '/usr/bin')
  t.is(base.PATH, '/bin')
  t.is(environment.env.PATH, '/usr/bin')
})
