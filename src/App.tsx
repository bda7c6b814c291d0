import { useState, useCallback } from 'react';
import { motion, AnimatePresence } from 'framer-motion';
import { FlowCanvas } from './components/Flow/FlowCanvas';
import { PaperDetails } from './components/Sidebar/PaperDetails';
import { SearchBar } from './components/Controls/SearchBar';
import { StatusBar } from './components/Controls/StatusBar';
import { ExpansionSettings } from './components/Controls/ExpansionSettings';
import { useExpansionEngine } from './hooks/useExpansionEngine';
import type { ExpansionEngine } from './graph/expansionEngine';

interface AppProps {
  engine: ExpansionEngine;
  /** Initial per-expansion cap; 0 means unlimited. */
  initialMaxReferences?: number;
}

function App({ engine, initialMaxReferences = 0 }: AppProps) {
  const { snapshot, search, clickNode } = useExpansionEngine(engine);
  const [maxReferences, setMaxReferences] = useState(initialMaxReferences);

  const handleMaxReferencesChange = useCallback(
    (max: number) => {
      setMaxReferences(max);
      engine.setMaxReferences(max > 0 ? max : null);
    },
    [engine]
  );

  const paperCount = Math.max(snapshot.nodes.length - 1, 0);

  return (
    <div className="h-screen flex flex-col bg-[#0a0a0f] overflow-hidden">
      {/* Header */}
      <header className="relative z-20 bg-[#0a0a0f]/80 backdrop-blur-xl border-b border-white/5">
        <div className="px-6 py-4 flex items-center justify-between gap-6">
          <div className="flex items-center gap-4">
            <motion.div
              initial={{ opacity: 0, x: -20 }}
              animate={{ opacity: 1, x: 0 }}
              className="flex items-center gap-3"
            >
              <div className="w-8 h-8 rounded-lg bg-gradient-to-br from-indigo-500 to-purple-600 flex items-center justify-center">
                <svg className="w-4 h-4 text-white" fill="none" stroke="currentColor" viewBox="0 0 24 24">
                  <path strokeLinecap="round" strokeLinejoin="round" strokeWidth={2} d="M13.828 10.172a4 4 0 00-5.656 0l-4 4a4 4 0 105.656 5.656l1.102-1.101m-.758-4.899a4 4 0 005.656 0l4-4a4 4 0 00-5.656-5.656l-1.1 1.1" />
                </svg>
              </div>
              <h1 className="text-white text-lg font-bold tracking-tight">
                Reference Explorer
              </h1>
            </motion.div>

            {snapshot.rootKey && (
              <motion.div
                initial={{ opacity: 0 }}
                animate={{ opacity: 1 }}
                transition={{ delay: 0.2 }}
                className="hidden sm:flex items-center gap-2 ml-4 pl-4 border-l border-white/10"
              >
                <span className="text-gray-500 text-sm">
                  Showing{' '}
                  <span className="text-indigo-400 font-medium">{paperCount}</span>{' '}
                  references
                </span>
              </motion.div>
            )}
          </div>

          <SearchBar onSearch={search} searching={snapshot.searching} />
        </div>
      </header>

      {/* Main Content */}
      <div className="flex-1 flex overflow-hidden">
        <main className="flex-1 relative">
          <AnimatePresence mode="wait">
            {snapshot.rootKey ? (
              <motion.div
                key={snapshot.rootKey}
                initial={{ opacity: 0 }}
                animate={{ opacity: 1 }}
                exit={{ opacity: 0 }}
                transition={{ duration: 0.3 }}
                className="absolute inset-0"
              >
                <FlowCanvas
                  graphNodes={snapshot.nodes}
                  graphEdges={snapshot.edges}
                  selectedKey={snapshot.selectedKey}
                  loading={snapshot.loading}
                  onNodeClick={clickNode}
                />
              </motion.div>
            ) : (
              <motion.div
                key="empty"
                initial={{ opacity: 0 }}
                animate={{ opacity: 1 }}
                exit={{ opacity: 0 }}
                className="absolute inset-0 flex items-center justify-center"
              >
                <p className="text-gray-500 text-sm">
                  Search for a paper to explore the papers it references.
                </p>
              </motion.div>
            )}
          </AnimatePresence>

          <div className="absolute bottom-20 left-6 pointer-events-none">
            <div className="text-gray-600 text-xs uppercase tracking-widest mb-1">
              Reference Graph
            </div>
            <div className="text-gray-500 text-xs">
              Click a paper to expand its references, click again to collapse
            </div>
          </div>
        </main>

        {/* Sidebar */}
        <motion.aside
          initial={{ opacity: 0, x: 20 }}
          animate={{ opacity: 1, x: 0 }}
          transition={{ delay: 0.2 }}
          className="w-80 flex-shrink-0 overflow-y-auto"
        >
          <PaperDetails paper={snapshot.selected} occurrences={snapshot.selectedOccurrences} />
        </motion.aside>
      </div>

      {/* Footer */}
      <footer className="relative z-20 bg-[#0a0a0f]/80 backdrop-blur-xl border-t border-white/5 px-6 py-4 flex items-center justify-between gap-6">
        <ExpansionSettings maxReferences={maxReferences} onMaxReferencesChange={handleMaxReferencesChange} />
        <StatusBar status={snapshot.status} />
      </footer>
    </div>
  );
}

export default App;
