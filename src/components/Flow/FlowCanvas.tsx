import { useMemo, useCallback, useEffect } from 'react';
import {
  ReactFlow,
  Background,
  Controls,
  useNodesState,
  useEdgesState,
  type EdgeTypes,
  type NodeMouseHandler,
  type NodeTypes,
} from '@xyflow/react';
import '@xyflow/react/dist/style.css';
import { PaperNode } from './PaperNode';
import { SeedNode } from './SeedNode';
import { CitationEdge } from './CitationEdge';
import { buildFlowElements, type CitationFlowEdge, type PaperFlowNode } from './layout';
import type { GraphEdge, GraphNode, NodeKey } from '../../types/paper';

const nodeTypes = {
  paper: PaperNode,
  seed: SeedNode,
} satisfies NodeTypes;

const edgeTypes = {
  citation: CitationEdge,
} satisfies EdgeTypes;

interface FlowCanvasProps {
  graphNodes: GraphNode[];
  graphEdges: GraphEdge[];
  selectedKey: NodeKey | null;
  loading: NodeKey[];
  onNodeClick: (key: NodeKey) => void;
}

export function FlowCanvas({
  graphNodes,
  graphEdges,
  selectedKey,
  loading,
  onNodeClick,
}: FlowCanvasProps) {
  const { nodes: initialNodes, edges: initialEdges } = useMemo(
    () => buildFlowElements(graphNodes, graphEdges, { selectedKey, loading }),
    [graphNodes, graphEdges, selectedKey, loading]
  );

  const [nodes, setNodes, onNodesChange] = useNodesState<PaperFlowNode>(initialNodes);
  const [edges, setEdges, onEdgesChange] = useEdgesState<CitationFlowEdge>(initialEdges);

  // Update nodes when the graph changes
  useEffect(() => {
    setNodes(initialNodes);
    setEdges(initialEdges);
  }, [initialNodes, initialEdges, setNodes, setEdges]);

  const handleNodeClick = useCallback<NodeMouseHandler<PaperFlowNode>>(
    (_, node) => {
      onNodeClick(node.id);
    },
    [onNodeClick]
  );

  return (
    <div className="w-full h-full bg-[#0a0a0f]">
      <ReactFlow
        nodes={nodes}
        edges={edges}
        onNodesChange={onNodesChange}
        onEdgesChange={onEdgesChange}
        onNodeClick={handleNodeClick}
        nodeTypes={nodeTypes}
        edgeTypes={edgeTypes}
        nodesConnectable={false}
        fitView
        fitViewOptions={{ padding: 0.2 }}
        minZoom={0.1}
        maxZoom={1.5}
        proOptions={{ hideAttribution: true }}
      >
        <Background color="#1a1a2e" gap={24} size={1} />
        <Controls showInteractive={false} />
      </ReactFlow>
    </div>
  );
}
