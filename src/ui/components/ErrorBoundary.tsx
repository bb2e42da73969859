import { Component } from 'react';
import type { ReactNode, ErrorInfo } from 'react';

interface Props {
  children: ReactNode;
  onReset?: () => void;
}

interface State {
  error: Error | null;
}

/** Catches render failures in the game screen and offers a way back to the menu. */
export class ErrorBoundary extends Component<Props, State> {
  state: State = { error: null };

  static getDerivedStateFromError(error: Error): State {
    return { error };
  }

  componentDidCatch(error: Error, info: ErrorInfo) {
    console.error('Game screen crashed:', error, info.componentStack);
  }

  private handleReset = () => {
    this.setState({ error: null });
    this.props.onReset?.();
  };

  render() {
    const { error } = this.state;
    if (error === null) return this.props.children;

    return (
      <div style={{
        display: 'flex', flexDirection: 'column', alignItems: 'center',
        justifyContent: 'center', minHeight: '100vh', padding: 32,
        fontFamily: 'system-ui, sans-serif', color: '#2c3e50',
      }}>
        <h2 style={{ marginBottom: 12 }}>The game hit an error</h2>
        <pre style={{
          padding: 12, backgroundColor: '#f8f9fa', borderRadius: 6,
          fontSize: 12, color: '#c0392b', marginBottom: 24,
          maxWidth: '90vw', overflow: 'auto',
        }}>
          {error.message}
        </pre>
        {this.props.onReset && (
          <button
            onClick={this.handleReset}
            style={{
              padding: '10px 24px', fontSize: 14,
              backgroundColor: '#3498db', color: 'white',
              border: 'none', borderRadius: 6, cursor: 'pointer',
            }}
          >
            Back to Menu
          </button>
        )}
      </div>
    );
  }
}
