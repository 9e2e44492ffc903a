import React from 'react';
import { ZoneGeometry } from '../types';
import { Viewport } from '../utils/mathUtils';
import { geometryToSvgPaths } from '../utils/exportUtils';

interface ZoneRendererProps {
  name: string;
  geometry: ZoneGeometry;
  viewport: Viewport;
  color: string;
  isSelected: boolean;
  onSelect: (name: string) => void;
}

export const ZoneRenderer: React.FC<ZoneRendererProps> = ({ name, geometry, viewport, color, isSelected, onSelect }) => {
  const paths = geometryToSvgPaths(geometry, viewport);

  return (
    <g
      className="zone-group cursor-pointer"
      data-zone={name}
      onClick={() => onSelect(name)}
    >
      {paths.map((d, i) => (
        <path
          key={i}
          d={d}
          fill={color}
          fillOpacity={isSelected ? 0.45 : 0.12}
          fillRule="evenodd"
          stroke={isSelected ? '#1d4ed8' : color}
          strokeWidth={isSelected ? 2.5 : 1.5}
          strokeLinejoin="round"
          vectorEffect="non-scaling-stroke"
        >
          <title>{name}</title>
        </path>
      ))}
    </g>
  );
};
