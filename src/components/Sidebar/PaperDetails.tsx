import { motion, AnimatePresence } from 'framer-motion';
import { formatAuthors, formatYear } from '../../lib/format';
import type { Paper } from '../../types/paper';

interface PaperDetailsProps {
  paper: Paper | null;
  /** Times the paper has appeared in the graph this session. */
  occurrences?: number;
}

export function PaperDetails({ paper, occurrences = 0 }: PaperDetailsProps) {
  return (
    <div className="h-full bg-white/[0.02] backdrop-blur-xl border-l border-white/10">
      <div className="border-b border-white/10 px-5 py-4">
        <h2 className="text-white font-semibold text-sm uppercase tracking-wider">
          Paper Details
        </h2>
      </div>

      <AnimatePresence mode="wait">
        {paper ? (
          <motion.div
            key={paper.paperId}
            initial={{ opacity: 0, y: 10 }}
            animate={{ opacity: 1, y: 0 }}
            exit={{ opacity: 0, y: -10 }}
            transition={{ duration: 0.2 }}
            className="p-5 space-y-5"
          >
            <div>
              <h3 className="text-white font-semibold text-lg leading-tight" data-testid="paper-title">
                {paper.title}
              </h3>
            </div>

            <div className="flex flex-wrap gap-3">
              <div className="bg-indigo-500/20 border border-indigo-500/30 rounded-lg px-3 py-1.5">
                <span className="text-indigo-300 text-sm font-mono font-semibold" data-testid="paper-year">
                  {formatYear(paper.year)}
                </span>
              </div>
              <div className="bg-purple-500/20 border border-purple-500/30 rounded-lg px-3 py-1.5">
                <span className="text-purple-300 text-sm" data-testid="paper-citations">
                  {paper.citationCount.toLocaleString('en-US')} citations
                </span>
              </div>
              {occurrences > 1 && (
                <div className="bg-amber-500/20 border border-amber-500/30 rounded-lg px-3 py-1.5">
                  <span className="text-amber-300 text-sm" data-testid="paper-occurrences">
                    Appears {occurrences}× in graph
                  </span>
                </div>
              )}
            </div>

            <div>
              <label className="text-gray-500 text-xs uppercase tracking-wider font-medium">
                Authors
              </label>
              <p className="text-gray-300 text-sm mt-1 leading-relaxed" data-testid="paper-authors">
                {formatAuthors(paper.authors)}
              </p>
            </div>

            <div>
              <label className="text-gray-500 text-xs uppercase tracking-wider font-medium">
                Venue
              </label>
              <p className="text-gray-300 text-sm mt-1" data-testid="paper-venue">
                {paper.venue ?? 'Unknown'}
              </p>
            </div>

            {paper.url && (
              <a
                href={paper.url}
                target="_blank"
                rel="noopener noreferrer"
                className="
                  inline-flex items-center gap-2
                  bg-indigo-600/20 hover:bg-indigo-600/30
                  border border-indigo-500/40 hover:border-indigo-500/60
                  text-indigo-300 hover:text-indigo-200
                  rounded-lg px-4 py-2 text-sm font-medium
                  transition-all duration-200
                "
              >
                View Paper
                <svg
                  className="w-4 h-4"
                  fill="none"
                  stroke="currentColor"
                  viewBox="0 0 24 24"
                >
                  <path
                    strokeLinecap="round"
                    strokeLinejoin="round"
                    strokeWidth={2}
                    d="M10 6H6a2 2 0 00-2 2v10a2 2 0 002 2h10a2 2 0 002-2v-4M14 4h6m0 0v6m0-6L10 14"
                  />
                </svg>
              </a>
            )}
          </motion.div>
        ) : (
          <motion.div
            initial={{ opacity: 0 }}
            animate={{ opacity: 1 }}
            className="p-5 text-gray-500 text-sm"
          >
            <p>Click a node to see paper details</p>
          </motion.div>
        )}
      </AnimatePresence>
    </div>
  );
}
