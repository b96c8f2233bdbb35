import React from 'react';
import { ScoringMode } from '../../enums';
import type { RankedFit } from '../../types';
import { bestFitHeadline } from '../../lib/fit/ranking';
import { seriesStyleFor } from '../../lib/fit/palette';

export const BestFitCallout: React.FC<{ best: RankedFit; mode: ScoringMode }> = ({ best, mode }) => (
    <div
        role="status"
        className="mt-4 px-4 py-3 rounded border text-sm font-bold"
        style={{ borderColor: seriesStyleFor(best.name).color }}
    >
        {bestFitHeadline(best, mode)}
    </div>
);
