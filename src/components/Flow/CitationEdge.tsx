import { BaseEdge, getBezierPath, type EdgeProps } from '@xyflow/react';
import { edgeColor, type CitationFlowEdge } from './layout';

export function CitationEdge({
  id,
  sourceX,
  sourceY,
  targetX,
  targetY,
  sourcePosition,
  targetPosition,
  markerEnd,
  data,
}: EdgeProps<CitationFlowEdge>) {
  const [edgePath] = getBezierPath({
    sourceX,
    sourceY,
    sourcePosition,
    targetX,
    targetY,
    targetPosition,
  });
  const depth = data?.depth ?? 1;

  return (
    <>
      {/* Glow layer */}
      <BaseEdge
        id={`${id}-glow`}
        path={edgePath}
        style={{
          stroke: 'rgba(99, 102, 241, 0.25)',
          strokeWidth: 6,
          filter: 'blur(4px)',
        }}
      />

      <BaseEdge
        id={id}
        path={edgePath}
        markerEnd={markerEnd}
        style={{
          stroke: edgeColor(depth),
          strokeWidth: depth === 1 ? 1.5 : 1,
          opacity: 0.7,
        }}
      />
    </>
  );
}
