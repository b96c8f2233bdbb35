import React, { useMemo } from 'react';
import { Radar, RadarChart, PolarGrid, PolarAngleAxis, PolarRadiusAxis, ResponsiveContainer, Tooltip, Legend } from 'recharts';
import { SeriesKind } from '../../enums';
import type { FitModel, RadarOrientation, RadarPolygon } from '../../types';
import { rechartsAngles, toRadarRows } from '../../lib/fit/radar';
import { scaleTicks } from '../../lib/fit/scale';
import { seriesStyleFor, TASK_STYLE } from '../../lib/fit/palette';

interface FitRadarChartProps {
    model: FitModel;
    polygons: readonly RadarPolygon[];
    orientation: RadarOrientation;
    height?: number;
}

export const FitRadarChart: React.FC<FitRadarChartProps> = ({ model, polygons, orientation, height = 440 }) => {
    const data = useMemo(() => toRadarRows(model, polygons), [model, polygons]);
    const { startAngle, endAngle } = rechartsAngles(orientation);
    const tickCount = scaleTicks(model.scale).length;

    return (
        <ResponsiveContainer width="100%" height={height}>
            <RadarChart cx="50%" cy="50%" outerRadius="75%" data={data} startAngle={startAngle} endAngle={endAngle}>
                <PolarGrid stroke="#d5d5d5" />
                <PolarAngleAxis dataKey="dimension" tick={{ fill: '#444444', fontSize: 11 }} />
                <PolarRadiusAxis
                    angle={90}
                    domain={[model.scale.min, model.scale.max]}
                    tickCount={tickCount}
                    tick={{ fill: '#666666', fontSize: 11 }}
                    axisLine={false}
                />
                {polygons.map(poly => {
                    const style = poly.kind === SeriesKind.Task ? TASK_STYLE : seriesStyleFor(poly.name);
                    return (
                        <Radar
                            key={poly.name}
                            name={poly.name}
                            dataKey={poly.name}
                            stroke={style.color}
                            strokeWidth={style.strokeWidth}
                            strokeDasharray={style.dash}
                            fill={style.fill}
                            fillOpacity={style.fillOpacity}
                            isAnimationActive={false}
                        />
                    );
                })}
                <Tooltip />
                <Legend verticalAlign="middle" align="right" layout="vertical" />
            </RadarChart>
        </ResponsiveContainer>
    );
};
