import fs from 'fs';
import os from 'os';
import path from 'path';
import { archetypeFile, InputLoader } from '../../src/services/input-loader';
import { SchemaValidator } from '../../src/services/schema-validator';
import { AppError, ErrorCategory, ValidationError } from '../../src/util/error-handler';
import { DATA_DIR, EXAMPLE_PAYLOAD, thrown } from '../fixtures/payload';
import { MockLogger } from '../mocks/logger.mock';

describe('InputLoader', () => {
  let workDir: string;
  let logger: MockLogger;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'bsem-input-'));
    logger = new MockLogger();
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  const loader = (dataDir: string = DATA_DIR): InputLoader =>
    new InputLoader(dataDir, new SchemaValidator(logger), logger);

  it('loads and validates the payload', () => {
    const scenario = loader().loadPayload(EXAMPLE_PAYLOAD);
    expect(scenario.nutsid).toBe('ES21');
    expect(scenario.year).toBe(2030);
  });

  it('reports unreadable JSON as a validation failure', () => {
    const file = path.join(workDir, 'broken.json');
    fs.writeFileSync(file, '{ "nutsid": ');

    const error = thrown(() => loader().loadPayload(file));
    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({
      category: ErrorCategory.VALIDATION,
      message: `Payload ${file} could not be read as JSON`,
    });
  });

  it('reports an invalid payload with every violation', () => {
    const file = path.join(workDir, 'partial.json');
    fs.writeFileSync(file, JSON.stringify({ nutsid: 'ES21', year: 2019 }));

    const error = thrown(() => loader().loadPayload(file));
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      category: ErrorCategory.VALIDATION,
      violations: [{ path: 'scenario', rule: 'required', message: 'is not present or has a null value' }],
    });
  });

  it('loads the regional inventories', () => {
    expect(loader().loadArchetypes('ES41')).toHaveLength(98);
    expect(loader().loadRadiation('ES41').every(record => record.region.startsWith('ES41'))).toBe(true);
    expect(logger.debug).toHaveBeenCalledWith(`Loaded 98 archetypes from ${archetypeFile(DATA_DIR, 'ES41')}`);
  });

  it('reports a missing inventory as a data integrity failure', () => {
    const error = thrown(() => loader(workDir).loadArchetypes('ES21'));
    expect(error).toMatchObject({
      category: ErrorCategory.DATA_INTEGRITY,
      message: `Required input file does not exist: ${archetypeFile(workDir, 'ES21')}`,
    });
  });

  it('reports a malformed inventory as a data integrity failure', () => {
    fs.mkdirSync(path.join(workDir, 'regions'));
    fs.writeFileSync(archetypeFile(workDir, 'ES21'), 'Use,Period\nOffices,Pre-1945\n');

    const error = thrown(() => loader(workDir).loadArchetypes('ES21'));
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ category: ErrorCategory.DATA_INTEGRITY });
  });
});
