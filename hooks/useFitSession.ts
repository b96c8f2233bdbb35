// hooks/useFitSession.ts

import { useCallback, useMemo, useState } from 'react';
import { AngularDirection } from '../enums';
import type { FitEvaluation, FitModel, RadarOrientation, Vector } from '../types';
import {
    createTaskVector,
    evaluateTask,
    sessionTask,
    snapTaskValue,
    startTaskSession,
    updateTaskSession,
    type TaskSession,
} from '../lib/fit/session';

// First axis at 12 o'clock, going clockwise.
export const CHART_ORIENTATION: RadarOrientation = {
    direction: AngularDirection.Clockwise,
    rotation: 90,
};

export interface FitSession {
    task: Vector;
    evaluation: FitEvaluation;
    orientation: RadarOrientation;
    setValue: (dimension: number | string, value: number) => void;
    reset: () => void;
}

/**
 * Task vector for one user session. Switching to another model starts over at the midpoint.
 */
export const useFitSession = (model: FitModel, orientation: RadarOrientation = CHART_ORIENTATION): FitSession => {
    const fresh = useMemo(() => createTaskVector(model), [model]);
    const [session, setSession] = useState<TaskSession>(() => startTaskSession(model));
    const task = sessionTask(session, model, fresh);

    const setValue = useCallback((dimension: number | string, value: number) => {
        const next = snapTaskValue(model, value);
        setSession(prev => updateTaskSession(prev, model, dimension, next));
    }, [model]);

    const reset = useCallback(() => {
        setSession(startTaskSession(model));
    }, [model]);

    const evaluation = useMemo(() => evaluateTask(model, task, orientation), [model, task, orientation]);

    return { task, evaluation, orientation, setValue, reset };
};
