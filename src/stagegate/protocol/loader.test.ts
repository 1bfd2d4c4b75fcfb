import { describe, it, expect, beforeEach, afterEach, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { ProcessLoader } from './loader';
import { buildProcess } from './builder';
import { DefinitionError, ConfigurationError } from '../errors';
import { Gate } from '../gates/gate';
import { Lock } from '../locks/lock';
import { ValidatorRegistry } from '../locks/registry';
import { setLogLevel } from '../shared/logger';

const ONBOARDING_YAML = `
process:
  name: onboarding
  description: Customer onboarding
  gate_library:
    contactable:
      locks:
        - exists: email
        - regex:
            property_path: email
            value: "[^@]+@"
  stages:
    registration:
      schema:
        required_fields: [email]
        optional_fields: [plan]
        default_values:
          plan: free
      gates:
        profile:
          target_stage: verification
          locks:
            - use: contactable
            - is_true: terms_accepted
      actions:
        fulfilling:
          - type: complete_field
            description: "Finish registration for {who}"
            priority: high
            properties:
              who: email
    verification:
      schema:
        required_fields: [email, document]
      gates:
        - name: checked
          locks:
            - type: in_list
              property_path: document.kind
              expected_value: [passport, licence]
            - not_empty: document.number
`;

beforeAll(() => setLogLevel('silent'));
afterAll(() => setLogLevel(undefined));

describe('ProcessLoader', () => {
  let tempDir: string;
  const loader = new ProcessLoader();

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'stagegate-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should load a YAML definition wrapped under process', async () => {
    const file = path.join(tempDir, 'onboarding.yaml');
    await fs.writeFile(file, ONBOARDING_YAML);

    const definition = await loader.loadFile(file);
    expect(definition.name).toBe('onboarding');
    expect(definition.allow_stage_skipping).toBe(false);
    expect(Object.keys(definition.gate_library)).toEqual(['contactable']);
  });

  it('should build a working process from YAML', async () => {
    const file = path.join(tempDir, 'onboarding.yml');
    await fs.writeFile(file, ONBOARDING_YAML);
    const process = await loader.loadProcess(file);

    expect(process.stageOrder).toEqual(['registration', 'verification']);
    expect(process.metadata.description).toBe('Customer onboarding');

    const registration = process.getStage('registration');
    const profile = registration?.getGate('profile');
    expect(profile?.targetStage).toBe('verification');
    expect(profile?.getComplexity()).toBe(3);

    const pending = process.evaluate({ email: 'ada@example.com' });
    expect(pending.state).toBe('fulfilling');
    expect(pending.actions.map(a => [a.description, a.priority])).toEqual([
      ['Finish registration for ada@example.com', 'high'],
    ]);

    const done = process.evaluate({
      email: 'ada@example.com',
      terms_accepted: true,
      document: { kind: 'passport', number: 'X1' },
    });
    expect(done.state).toBe('completed');
    expect(done.metadata.final_stage).toBe('verification');
  });

  it('should load JSON definitions with list stages', async () => {
    const file = path.join(tempDir, 'simple.json');
    await fs.writeFile(file, JSON.stringify({
      name: 'simple',
      stages: [{ name: 'only', gates: [{ name: 'ready', locks: [{ equals: { property_path: 'status', value: 'ready' } }] }] }],
    }));
    const process = await loader.loadProcess(file);
    expect(process.evaluate({ status: 'ready' }).state).toBe('completed');
    expect(process.evaluate({ status: 'draft' }).state).toBe('fulfilling');
  });

  it('should reject unsupported extensions and unreadable files', async () => {
    await expect(loader.loadFile(path.join(tempDir, 'process.txt'))).rejects.toThrow(DefinitionError);
    await expect(loader.loadFile(path.join(tempDir, 'missing.yaml'))).rejects.toThrow(/Cannot read definition/);
  });

  it('should report schema violations with their path', () => {
    expect(() => loader.parse('stages: []', 'yaml')).toThrow('Invalid process definition: name: Required');
  });

  it('should reject malformed text', () => {
    expect(() => loader.parse('{ not json', 'json')).toThrow(/^Invalid JSON/);
  });

  it('should reject unknown lock forms', () => {
    const text = JSON.stringify({ name: 'p', stages: [{ name: 's', gates: [{ name: 'g', locks: [{ sparkle: 'x' }] }] }] });
    expect(() => loader.parse(text, 'json')).toThrow(DefinitionError);
  });
});

describe('buildProcess', () => {
  const loader = new ProcessLoader();

  it('should expand shorthand lock forms', () => {
    const definition = loader.validate({
      name: 'p',
      stages: [{
        name: 's',
        gates: [{
          name: 'g',
          locks: [
            { exists: 'a' },
            { not_exists: 'b' },
            { is_true: 'c' },
            { is_false: 'd' },
            { not_empty: 'e' },
            { range: { property_path: 'f', value: [1, 2] } },
            { custom: { property_path: 'g', validator_name: 'even' } },
            { type: 'length', property_path: 'h', expected_value: 2 },
          ],
        }],
      }],
    });
    const gate = buildProcess(definition).getStage('s')?.getGate('g');
    expect(gate?.locks.map(l => l.toJSON())).toEqual([
      { type: 'exists', property_path: 'a', expected_value: true, metadata: {} },
      { type: 'exists', property_path: 'b', expected_value: false, metadata: {} },
      { type: 'equals', property_path: 'c', expected_value: true, metadata: {} },
      { type: 'equals', property_path: 'd', expected_value: false, metadata: {} },
      { type: 'not_empty', property_path: 'e', expected_value: undefined, metadata: {} },
      { type: 'range', property_path: 'f', expected_value: [1, 2], metadata: {} },
      { type: 'custom', property_path: 'g', expected_value: undefined, validator_name: 'even', metadata: {} },
      { type: 'length', property_path: 'h', expected_value: 2, metadata: {} },
    ]);
  });

  it('should build nested gates and share library gates', () => {
    const definition = loader.validate({
      name: 'p',
      gate_library: { base: { locks: [{ exists: 'id' }] } },
      stages: [{
        name: 's',
        gates: [
          { name: 'one', locks: [{ use: 'base' }, { gate: { name: 'inner', locks: [{ exists: 'x' }] } }] },
          { name: 'two', locks: [{ use: 'base' }] },
        ],
      }],
    });
    const stage = buildProcess(definition).getStage('s');
    const one = stage?.getGate('one');
    const two = stage?.getGate('two');
    expect(one?.maxDepth()).toBe(2);
    expect(one?.components[0]).toBeInstanceOf(Gate);
    expect(one?.components[0]).toBe(two?.components[0]);
  });

  it('should reject reference cycles', () => {
    const definition = loader.validate({
      name: 'p',
      gate_library: {
        a: { locks: [{ use: 'b' }] },
        b: { locks: [{ use: 'a' }] },
      },
      stages: [{ name: 's', gates: [{ name: 'g', locks: [{ use: 'a' }] }] }],
    });
    expect(() => buildProcess(definition)).toThrow('Gate reference cycle: a -> b -> a');
  });

  it('should reject unknown references and invalid locks', () => {
    const unknown = loader.validate({ name: 'p', stages: [{ name: 's', gates: [{ name: 'g', locks: [{ use: 'zzz' }] }] }] });
    expect(() => buildProcess(unknown)).toThrow("Unknown gate reference 'zzz'");

    const invalid = loader.validate({ name: 'p', stages: [{ name: 's', gates: [{ name: 'g', locks: [{ equals: 'status' }] }] }] });
    expect(() => buildProcess(invalid)).toThrow(ConfigurationError);
  });

  it('should wire the validator registry through', () => {
    const definition = loader.validate({
      name: 'p',
      stages: [{ name: 's', gates: [{ name: 'g', locks: [{ custom: { property_path: 'n', validator_name: 'even' } }] }] }],
    });
    const validators = new ValidatorRegistry({ even: v => typeof v === 'number' && v % 2 === 0 });
    const process = buildProcess(definition, { validators });
    expect(process.evaluate({ n: 4 }).state).toBe('completed');
    expect(process.getStage('s')?.gates[0].components[0]).toBeInstanceOf(Lock);
  });
});
