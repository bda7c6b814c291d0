import { useCallback, useSyncExternalStore } from 'react';
import type { EngineSnapshot, ExpansionEngine } from '../graph/expansionEngine';
import type { NodeKey } from '../types/paper';

export interface ExpansionControls {
  snapshot: EngineSnapshot;
  search: (title: string) => void;
  clickNode: (key: NodeKey) => void;
}

export function useExpansionEngine(engine: ExpansionEngine): ExpansionControls {
  const snapshot = useSyncExternalStore(engine.subscribe, engine.getSnapshot);

  const search = useCallback(
    (title: string) => {
      engine.onSearch(title).catch((err: unknown) => {
        console.error('❌ Unexpected search failure:', err);
      });
    },
    [engine]
  );

  const clickNode = useCallback(
    (key: NodeKey) => {
      engine.onNodeClick(key).catch((err: unknown) => {
        console.error('❌ Unexpected failure handling node click:', err);
      });
    },
    [engine]
  );

  return { snapshot, search, clickNode };
}
