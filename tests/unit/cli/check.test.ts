import { describe, it, expect } from 'vitest';
import { runCheck, type CheckDependencies } from '../../../src/cli/commands/check.js';
import { silentLogger } from '../../../src/cli/utils/logger.js';
import type { GPUInfo } from '../../../src/models/DriverState.js';
import type { UpdateCheckResult } from '../../../src/models/UpdateCheckResult.js';
import { RecordingSink } from '../../helpers/fakes.js';

const MANUAL_URL = 'https://drivers.example.test/manual';

interface Scenario {
  available: boolean;
  version?: string | null;
  gpu?: GPUInfo;
  freshInstall?: boolean;
}

function createDeps(scenario: Scenario): { deps: CheckDependencies; sink: RecordingSink; checked: string[]; freshInstalls: number[] } {
  const sink = new RecordingSink();
  const checked: string[] = [];
  const freshInstalls: number[] = [];

  const deps: CheckDependencies = {
    detector: {
      isDriverAvailable: async () => scenario.available,
      getDriverVersion: async () => scenario.version ?? null,
      getGpuInfo: async () => scenario.gpu ?? {}
    },
    orchestrator: {
      installFresh: async () => {
        freshInstalls.push(1);
        return scenario.freshInstall ?? false;
      },
      checkForUpdates: async (currentVersion): Promise<UpdateCheckResult> => {
        checked.push(currentVersion);
        return { status: 'up-to-date', currentVersion, latestVersion: currentVersion };
      }
    },
    output: sink,
    logger: silentLogger,
    manualDownloadUrl: MANUAL_URL
  };

  return { deps, sink, checked, freshInstalls };
}

describe('runCheck', () => {
  it('should print the banner first', async () => {
    const { deps, sink } = createDeps({ available: true, version: '580.105.08' });

    await runCheck(deps, true);

    expect(sink.entries.slice(0, 4)).toEqual([
      { kind: 'rule', char: '=' },
      { kind: 'heading', message: 'NVIDIA Driver Check' },
      { kind: 'rule', char: '=' },
      { kind: 'line', message: '' }
    ]);
  });

  it('should exit 1 when no driver is present and the install does not happen', async () => {
    const { deps, sink, freshInstalls } = createDeps({ available: false });

    expect(await runCheck(deps)).toBe(1);
    expect(freshInstalls).toHaveLength(1);
    expect(sink.messages('error')).toEqual(['NVIDIA driver not found or nvidia-smi not available']);
    expect(sink.messages('line').slice(-2)).toEqual(['For manual installation, visit:', MANUAL_URL]);
  });

  it('should exit 0 after a successful fresh install', async () => {
    const { deps, sink } = createDeps({ available: false, freshInstall: true });

    expect(await runCheck(deps)).toBe(0);
    expect(sink.messages('success')).toEqual(['Installation process completed!']);
  });

  it('should report version and GPU details', async () => {
    const { deps, sink } = createDeps({
      available: true,
      version: '580.105.08',
      gpu: {
        gpuName: 'NVIDIA T4',
        cudaVersion: '13.0',
        memoryTotal: '15360 MiB',
        memoryUsed: '0 MiB',
        memoryFree: '15360 MiB'
      }
    });

    expect(await runCheck(deps, true)).toBe(0);
    expect(sink.messages('success')).toEqual(['NVIDIA driver is installed']);
    expect(sink.messages('line')).toContain('Driver Version: 580.105.08');
    expect(sink.messages('heading')).toEqual(['NVIDIA Driver Check', 'GPU Information:']);
    expect(sink.entries.filter((entry) => entry.kind === 'field')).toEqual([
      { kind: 'field', label: 'GPU Name', value: 'NVIDIA T4' },
      { kind: 'field', label: 'CUDA Version', value: '13.0' },
      { kind: 'field', label: 'Memory Total', value: '15360 MiB' },
      { kind: 'field', label: 'Memory Used', value: '0 MiB' },
      { kind: 'field', label: 'Memory Free', value: '15360 MiB' }
    ]);
  });

  it('should omit the GPU block when nothing is known', async () => {
    const { deps, sink } = createDeps({ available: true, version: '580.105.08' });

    await runCheck(deps, true);

    expect(sink.messages('heading')).toEqual(['NVIDIA Driver Check']);
  });

  it('should check for updates with the installed version', async () => {
    const { deps, checked } = createDeps({ available: true, version: '550.54.14' });

    expect(await runCheck(deps)).toBe(0);
    expect(checked).toEqual(['550.54.14']);
  });

  it('should skip the update check on request', async () => {
    const { deps, checked } = createDeps({ available: true, version: '550.54.14' });

    await runCheck(deps, true);

    expect(checked).toEqual([]);
  });

  it('should warn instead of checking when the version is unknown', async () => {
    const { deps, sink, checked } = createDeps({ available: true, version: null });

    expect(await runCheck(deps)).toBe(0);
    expect(checked).toEqual([]);
    expect(sink.messages('warning')).toEqual(['Cannot check for updates - current driver version unknown']);
  });
});
