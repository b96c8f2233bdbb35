import React from 'react';
import { ScoringMode } from '../../enums';
import type { RankedFit } from '../../types';
import { formatScore } from '../../lib/fit/ranking';

interface FitScoreTableProps {
    results: readonly RankedFit[];
    mode: ScoringMode;
}

export const FitScoreTable: React.FC<FitScoreTableProps> = ({ results, mode }) => (
    <table className="w-full text-sm">
        <thead>
            <tr className="text-left text-fit-text-light text-xs uppercase">
                <th className="py-1">#</th>
                <th className="py-1">Profile</th>
                <th className="py-1 text-right">{mode === ScoringMode.NormalizedPercent ? 'Score' : 'Points'}</th>
            </tr>
        </thead>
        <tbody>
            {results.map(r => (
                <tr key={r.name} className="border-t border-fit-border">
                    <td className="py-1 font-mono">{r.rank}</td>
                    <td className="py-1">{r.name}</td>
                    <td className="py-1 text-right font-mono">{formatScore(r.score, mode)}</td>
                </tr>
            ))}
        </tbody>
    </table>
);
