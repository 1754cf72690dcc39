import { writeFileSync } from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { ITTSProvider, SynthesisRequest } from '../providers/ai/ITTSProvider';
import { DurationProbe } from '../services/DurationProbe';
import { SynthesisUnitProcessor } from '../services/SynthesisUnitProcessor';
import { UnitNamer } from '../services/UnitNamer';
import { pcmToWav } from '../utils/AudioUtils';
import { SynthesisError } from '../utils/errors';
import { FakeClock, MemoryRunLog, createTempDir, removeTempDir } from './helpers';

/** Writes one second of audio and takes 1.5 s of clock time */
class OneSecondProvider implements ITTSProvider {
  readonly name = 'one-second';
  readonly requests: SynthesisRequest[] = [];

  constructor(private readonly clock: FakeClock) {}

  async synthesize(request: SynthesisRequest): Promise<void> {
    this.requests.push(request);
    writeFileSync(request.outputPath, pcmToWav(Buffer.alloc(32000), 16000));
    this.clock.advance(1500);
  }
}

describe('SynthesisUnitProcessor', () => {
  let dir: string;
  let clock: FakeClock;
  let runLog: MemoryRunLog;

  beforeEach(() => {
    dir = createTempDir();
    clock = new FakeClock(new Date(2026, 0, 2, 3, 4, 5));
    runLog = new MemoryRunLog();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  function createProcessor(provider: ITTSProvider): SynthesisUnitProcessor {
    return new SynthesisUnitProcessor({
      provider,
      namer: new UnitNamer(dir, clock),
      probe: new DurationProbe(runLog),
      runLog,
      speakerReference: '/voices/reference.wav',
      clock
    });
  }

  it('synthesizes a line unit and returns its measurements', async () => {
    const provider = new OneSecondProvider(clock);

    const record = await createProcessor(provider).process(3, 'Hello world.');

    expect(record).toEqual({
      label: 3,
      charCount: 12,
      elapsedTime: 1.5,
      audioDuration: 1,
      outputFile: '3_Hello worl.wav',
      outputPath: path.join(dir, '3_Hello worl.wav')
    });
    expect(provider.requests).toEqual([
      {
        speakerReference: '/voices/reference.wav',
        text: 'Hello world.',
        outputPath: path.join(dir, '3_Hello worl.wav')
      }
    ]);
    expect(runLog.lines).toEqual([
      'Processing line 3: Hello world.... characters: 12',
      'Output file: 3_Hello worl.wav',
      'Completed: 3_Hello worl.wav elapsed: 1.50 s',
      ''
    ]);
  });

  it('names and announces the whole-text unit', async () => {
    const record = await createProcessor(new OneSecondProvider(clock)).process('full_text', 'Hello world. Goodbye.');

    expect(record.label).toBe('full_text');
    expect(record.charCount).toBe(21);
    expect(record.outputFile).toBe('full_text_20260102_030405_Hello worl.wav');
    expect(runLog.lines[0]).toBe('Processing full text: Hello world. Goodbye.... characters: 21');
  });

  it('previews only the first 50 characters but counts all of them', async () => {
    const text = 'a'.repeat(60);

    const record = await createProcessor(new OneSecondProvider(clock)).process(1, text);

    expect(record.charCount).toBe(60);
    expect(runLog.lines[0]).toBe(`Processing line 1: ${'a'.repeat(50)}... characters: 60`);
  });

  it('records a zero duration when the engine leaves no readable file', async () => {
    const provider: ITTSProvider = {
      name: 'no-output',
      synthesize: async () => {
        clock.advance(250);
      }
    };

    const record = await createProcessor(provider).process(7, 'Silent');

    const outputPath = path.join(dir, '7_Silent.wav');
    expect(record.audioDuration).toBe(0);
    expect(record.elapsedTime).toBe(0.25);
    expect(runLog.lines[2]).toBe(
      `Warning: could not read duration of audio file ${outputPath}: ENOENT: no such file or directory, open '${outputPath}'`
    );
    expect(runLog.lines[3]).toBe('Completed: 7_Silent.wav elapsed: 0.25 s');
  });

  it('propagates engine failures without completing the unit', async () => {
    const provider: ITTSProvider = {
      name: 'broken',
      synthesize: async () => {
        throw new Error('GPU out of memory');
      }
    };

    const failure = createProcessor(provider).process(4, 'Broken line');

    await expect(failure).rejects.toBeInstanceOf(SynthesisError);
    await expect(failure).rejects.toThrow('Synthesis failed for 4 (4_Broken lin.wav): GPU out of memory');
    expect(runLog.lines).toEqual([
      'Processing line 4: Broken line... characters: 11',
      'Output file: 4_Broken lin.wav'
    ]);
  });
});
