import { useRef, useEffect } from 'react';

interface GameLogProps {
  log: string[];
  limit?: number;
}

export function GameLog({ log, limit = 200 }: GameLogProps) {
  const endRef = useRef<HTMLDivElement>(null);
  const visible = log.slice(-limit);

  useEffect(() => {
    endRef.current?.scrollIntoView({ behavior: 'smooth' });
  }, [log.length]);

  return (
    <div
      style={{
        maxHeight: 220,
        overflowY: 'auto',
        border: '1px solid #ddd',
        borderRadius: 6,
        padding: 8,
        fontSize: 12,
        backgroundColor: '#fafafa',
      }}
    >
      {visible.length === 0 ? (
        <div style={{ color: '#999' }}>No moves yet</div>
      ) : (
        visible.map((entry, i) => (
          <div key={log.length - visible.length + i} style={{ padding: '1px 0', color: '#555' }}>
            {entry}
          </div>
        ))
      )}
      <div ref={endRef} />
    </div>
  );
}
