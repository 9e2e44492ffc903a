import { SetOperator } from './types';
import { CircleSlash, Combine, Layers, Minus } from 'lucide-react';

export const DEFAULT_CIRCLE_RESOLUTION = 64;
// The editor draws circles smoother than the library default
export const EDITOR_CIRCLE_RESOLUTION = 128;

export const DEFAULT_FPS = 30;

/** Distance under which a point counts as lying on a ring edge. */
export const COVERS_EPSILON = 1e-9;
/** A result whose area is at most this share of its larger operand is empty. */
export const RELATIVE_AREA_EPSILON = 1e-12;

export const ZONE_COLORS = [
  '#3b82f6', '#ef4444', '#10b981', '#f59e0b',
  '#8b5cf6', '#06b6d4', '#d946ef', '#84cc16',
  '#f97316', '#6366f1', '#f43f5e', '#71717a'
];

export const OPERATOR_CONFIG = [
  { id: SetOperator.UNION, label: 'Union', example: 'c = a U b', icon: Combine },
  { id: SetOperator.INTERSECTION, label: 'Intersection', example: 'c = a I b', icon: Layers },
  { id: SetOperator.DIFFERENCE, label: 'Difference', example: 'c = a - b', icon: Minus },
  { id: SetOperator.XOR, label: 'Symmetric difference', example: 'c = a ^ b', icon: CircleSlash },
];

export const SAMPLE_ZONE_SOURCE = `# Three overlapping circles of varying radii
c1        = (100, 100,  80)    # small circle near bottom-left
c2        = (500, 400, 150)    # large circle in upper centre
c3        = (200, 500, 100)    # medium circle near top

# A concave "starburst" polygon
starburst = [(600,540),(660,400),(840,400),(700,300),(760,160),(600,240),(440,160),(500,300),(360,400),(540,400)]

# A convex "diamond" polygon
diamond   = [(600,600),(800,300),(600,0),(400,300)]

# A donut with a hole
ring_big   = (250, 400, 140)
ring_small = (250, 400,  60)
donut      = ring_big - ring_small

# Carve holes and chain set operations
holey     = donut - starburst
combo1    = starburst U diamond
cutout    = combo1 - donut
symdiff1  = cutout ^ c1
mega_zone = symdiff1 U holey
`;

export const DEFAULT_GRID = {
  visible: true,
  ticks: 10,
  color: '#94a3b8',
};
