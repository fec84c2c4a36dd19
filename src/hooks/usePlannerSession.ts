import { useCallback, useEffect, useMemo, useRef, useState } from 'react';
import { toast } from 'sonner';
import type { CriterionConfig, DecisionMethod, RawTable } from '@/types/facility';
import { readPointsUpload, type UploadedFile } from '@/utils/importAdapter';
import { DEMO_DATA } from '@/utils/demoData';
import type { WeightedDefaults } from '@/utils/markerReconciler';
import type { PlannerConfig } from '@/utils/plannerConfig';
import {
  addManualPoint,
  applyDrawings,
  clearPoints,
  createInitialState,
  editTable,
  evaluatePlanner,
  loadTable,
  selectCriteria,
  setMapDefaults,
  setMapView,
  setMethod,
  updateCriterion,
  type ManualPointInput,
  type PlannerState,
} from '@/utils/plannerSession';

/** What the map component reports back after each interaction. */
export interface MapInteraction {
  allDrawings?: unknown;
  lastActiveDrawing?: unknown;
  center?: unknown;
  zoom?: unknown;
}

export function usePlannerSession(config: Partial<PlannerConfig> = {}) {
  const [state, setState] = useState<PlannerState>(() => createInitialState(config));
  const stateRef = useRef(state);
  stateRef.current = state;

  const commit = useCallback((next: PlannerState) => {
    stateRef.current = next;
    setState(next);
  }, []);

  const results = useMemo(() => evaluatePlanner(state), [state]);

  const usedFallback = results.method === 'center-of-gravity' && results.centroid.usedFallbackAverage;
  useEffect(() => {
    if (usedFallback) {
      toast.warning('All point weights are zero, using the plain average of coordinates');
    }
  }, [usedFallback]);

  const applyTable = useCallback((table: RawTable, source: string) => {
    const transition = loadTable(stateRef.current, table);
    if (!transition.changed) {
      toast.error(`No points with numeric coordinates found in ${source}`);
      return false;
    }
    commit(transition.state);
    const count = transition.state.method === 'topsis'
      ? transition.state.criteriaTable.points.length
      : transition.state.points.length;
    toast.success(`Loaded ${count} points from ${source}`);
    return true;
  }, [commit]);

  const uploadFile = useCallback(async (file: UploadedFile) => {
    const imported = await readPointsUpload(file);
    if (imported.status !== 'ok') {
      toast.error(imported.message);
      return false;
    }
    return applyTable(imported.table, file.name);
  }, [applyTable]);

  const loadDemoData = useCallback(() => applyTable(DEMO_DATA, 'demo data'), [applyTable]);

  const handleTableEdit = useCallback((table: RawTable) => {
    const transition = editTable(stateRef.current, table);
    if (transition.changed) commit(transition.state);
  }, [commit]);

  const addPoint = useCallback((input: ManualPointInput) => {
    const transition = addManualPoint(stateRef.current, input);
    if (!transition.changed) {
      toast.error('Please enter valid coordinates');
      return false;
    }
    commit(transition.state);
    return true;
  }, [commit]);

  const clearAll = useCallback(() => {
    commit(clearPoints(stateRef.current));
    toast.success('All points cleared');
  }, [commit]);

  const changeMethod = useCallback((method: DecisionMethod) => {
    commit(setMethod(stateRef.current, method));
  }, [commit]);

  const changeCriteria = useCallback((selected: string[]) => {
    commit(selectCriteria(stateRef.current, selected));
  }, [commit]);

  const changeCriterion = useCallback((criterion: string, patch: Partial<CriterionConfig>) => {
    commit(updateCriterion(stateRef.current, criterion, patch));
  }, [commit]);

  const changeMapDefaults = useCallback((defaults: Partial<WeightedDefaults>) => {
    commit(setMapDefaults(stateRef.current, defaults));
  }, [commit]);

  const handleMapInteraction = useCallback((interaction: MapInteraction) => {
    try {
      const viewed = setMapView(stateRef.current, interaction);
      const transition = applyDrawings(viewed, interaction.allDrawings, interaction.lastActiveDrawing);
      commit(transition.state);
      return transition.changed;
    } catch (error) {
      console.error('[PlannerSession] Failed to apply map drawings:', error);
      toast.error('Could not update points from the map');
      return false;
    }
  }, [commit]);

  return {
    state,
    results,
    uploadFile,
    loadDemoData,
    handleTableEdit,
    addPoint,
    clearAll,
    changeMethod,
    changeCriteria,
    changeCriterion,
    changeMapDefaults,
    handleMapInteraction,
  };
}
