import type { StrategyType } from '@ai/types';

interface AIThinkingIndicatorProps {
  playerName: string;
  strategyType: StrategyType;
  color: string;
}

export function AIThinkingIndicator({ playerName, strategyType, color }: AIThinkingIndicatorProps) {
  return (
    <div style={{
      padding: '8px 14px',
      border: `2px dashed ${color}`,
      borderRadius: 8,
      marginBottom: 8,
      display: 'flex',
      alignItems: 'center',
      gap: 10,
    }}>
      <div style={{
        width: 10,
        height: 10,
        borderRadius: '50%',
        backgroundColor: color,
        animation: 'ai-blink 0.9s ease-in-out infinite',
      }} />
      <span style={{ color, fontSize: 14 }}>
        <strong>{playerName}</strong> ({strategyType} AI) is choosing a move...
      </span>
      <style>{`
        @keyframes ai-blink {
          0%, 100% { opacity: 0.25; }
          50% { opacity: 1; }
        }
      `}</style>
    </div>
  );
}
