import type { SubPhaseDurations, SubPhaseName } from '@coldstart/shared';

interface PhaseMarker {
  phase: SubPhaseName;
  label: string;
  pattern: RegExp;
}

/**
 * vLLM startup log lines carrying sub-phase timings
 */
export const PHASE_MARKERS: readonly PhaseMarker[] = [
  { phase: 'weightLoad', label: 'vLLM Weight Loading', pattern: /Loading weights took (\d+(?:\.\d+)?) seconds/ },
  { phase: 'compile', label: 'Torch Compilation', pattern: /torch\.compile takes (\d+(?:\.\d+)?) s/ },
  { phase: 'graphCapture', label: 'CUDA Graph Capture', pattern: /Graph capturing finished in (\d+(?:\.\d+)?) secs/ },
];

/**
 * Sub-phase durations in seconds found in the log text. The first occurrence
 * of each marker wins; absent markers have no entry.
 */
export function extractPhaseDurations(logText: string): Partial<Record<SubPhaseName, number>> {
  const durations: Partial<Record<SubPhaseName, number>> = {};
  if (!logText) {
    return durations;
  }

  for (const { phase, pattern } of PHASE_MARKERS) {
    const match = pattern.exec(logText);
    if (match) {
      durations[phase] = Number(match[1]);
    }
  }

  return durations;
}

/**
 * Durations with absent markers defaulted to 0
 */
export function withDefaultSubPhases(durations: Partial<Record<SubPhaseName, number>>): SubPhaseDurations {
  return {
    weightLoad: durations.weightLoad ?? 0,
    compile: durations.compile ?? 0,
    graphCapture: durations.graphCapture ?? 0,
  };
}

export function hasReadyMarker(logText: string, marker: string): boolean {
  return logText.includes(marker);
}
