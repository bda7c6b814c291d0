import { Handle, Position, type NodeProps } from '@xyflow/react';
import { motion } from 'framer-motion';
import type { PaperFlowNode } from './layout';

export function PaperNode({ data, selected }: NodeProps<PaperFlowNode>) {
  const border = data.duplicate
    ? 'border-dashed border-amber-400/60'
    : selected
      ? 'border-indigo-500/60'
      : 'border-white/10 hover:border-indigo-500/40';

  return (
    <motion.div
      initial={{ opacity: 0, scale: 0.8 }}
      animate={{ opacity: 1, scale: 1 }}
      whileHover={{ scale: 1.05 }}
      transition={{ duration: 0.2 }}
      data-testid="paper-node"
      className={`
        bg-white/[0.03] backdrop-blur-xl
        border rounded-xl
        px-4 py-3 w-[220px]
        transition-all duration-300
        cursor-pointer
        ${border}
        ${selected
          ? 'shadow-[0_0_40px_rgba(99,102,241,0.35)]'
          : 'shadow-[0_0_20px_rgba(99,102,241,0.1)] hover:shadow-[0_0_30px_rgba(99,102,241,0.25)]'
        }
      `}
    >
      <Handle
        type="target"
        position={Position.Left}
        className="!bg-indigo-500 !border-indigo-400 !w-2 !h-2"
      />

      <h3 className="text-white font-medium text-sm leading-tight line-clamp-2">
        {data.title}
      </h3>

      <div className="flex items-center gap-2 mt-2">
        <span className="text-indigo-400 text-xs font-mono font-semibold">
          {data.year ?? 'n.d.'}
        </span>
        <span className="text-gray-600 text-xs">•</span>
        <span className="text-gray-400 text-xs">
          {data.citationCount.toLocaleString()} citations
        </span>
      </div>

      {data.venue && (
        <div className="text-gray-500 text-[11px] italic mt-1 truncate">{data.venue}</div>
      )}

      <div className="flex items-center gap-2 mt-1.5">
        {data.duplicate && (
          <span className="text-amber-300 text-[10px] uppercase tracking-wider">seen before</span>
        )}
        {data.loading && (
          <span className="w-3 h-3 border border-indigo-500/30 border-t-indigo-400 rounded-full animate-spin" />
        )}
        {data.expanded && (
          <span className="text-emerald-400/80 text-[10px] uppercase tracking-wider">expanded</span>
        )}
      </div>

      <Handle
        type="source"
        position={Position.Right}
        className="!bg-indigo-500 !border-indigo-400 !w-2 !h-2"
      />
    </motion.div>
  );
}
