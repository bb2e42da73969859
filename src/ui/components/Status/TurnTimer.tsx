interface TurnTimerProps {
  remaining: number;
  total: number;
  color: string;
}

export function TurnTimer({ remaining, total, color }: TurnTimerProps) {
  const seconds = Math.max(0, Math.ceil(remaining));
  const fraction = Math.max(0, Math.min(1, remaining / total));
  const urgent = remaining <= 5;

  return (
    <div style={{ minWidth: 120 }}>
      <div style={{
        fontSize: 13, fontWeight: 'bold', textAlign: 'right',
        color: urgent ? '#c0392b' : '#555',
      }}>
        {seconds}s
      </div>
      <div style={{ height: 6, backgroundColor: '#eee', borderRadius: 3, overflow: 'hidden' }}>
        <div style={{
          width: `${fraction * 100}%`, height: '100%',
          backgroundColor: urgent ? '#c0392b' : color,
          transition: 'width 0.25s linear',
        }} />
      </div>
    </div>
  );
}
