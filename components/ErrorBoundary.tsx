import React from 'react';

type Props = { children: React.ReactNode };

type State = {
  error: Error | null;
  info: React.ErrorInfo | null;
};

function downloadJson(obj: unknown, name: string) {
  const blob = new Blob([JSON.stringify(obj, null, 2)], { type: 'application/json' });
  const url = URL.createObjectURL(blob);
  const a = document.createElement('a');
  a.href = url;
  a.download = name;
  document.body.appendChild(a);
  a.click();
  a.remove();
  URL.revokeObjectURL(url);
}

const preStyle: React.CSSProperties = {
  whiteSpace: 'pre-wrap', fontSize: 11, lineHeight: 1.35, padding: 10, borderRadius: 10, background: 'rgba(0,0,0,0.35)', color: '#e6e6e6',
};

const buttonStyle: React.CSSProperties = {
  padding: '6px 10px', borderRadius: 8, border: '1px solid rgba(255,255,255,0.2)', background: 'rgba(0,0,0,0.2)', color: 'white',
};

export class ErrorBoundary extends React.Component<Props, State> {
  state: State = { error: null, info: null };

  static getDerivedStateFromError(error: Error): Partial<State> {
    return { error };
  }

  componentDidCatch(error: Error, info: React.ErrorInfo) {
    this.setState({ error, info });
    // eslint-disable-next-line no-console
    console.error('[ErrorBoundary]', error, info);
  }

  render() {
    const { error, info } = this.state;
    if (!error) return this.props.children;

    // ScaleRangeError / ShapeError / FitConfigError all carry their kind in `name`.
    const report = {
      schema: 'TaskFitCrashReportV1',
      time: new Date().toISOString(),
      kind: error.name,
      message: String(error.message || error),
      stack: String(error.stack || ''),
      componentStack: String(info?.componentStack || ''),
      location: String(window.location.href),
    };

    return (
      <div style={{ padding: 16, fontFamily: 'ui-monospace, SFMono-Regular, Menlo, Monaco, Consolas, monospace' }}>
        <div style={{ display: 'flex', justifyContent: 'space-between', alignItems: 'center', gap: 12 }}>
          <div>
            <div style={{ fontWeight: 700, fontSize: 14 }}>{report.kind}</div>
            <div style={{ opacity: 0.9, fontSize: 12 }}>{report.message}</div>
          </div>
          <div style={{ display: 'flex', gap: 8 }}>
            <button
              onClick={() => {
                this.setState({ error: null, info: null });
                window.location.reload();
              }}
              style={buttonStyle}
            >
              Reload
            </button>
            <button onClick={() => downloadJson(report, `task-fit-crash-${Date.now()}.json`)} style={buttonStyle}>
              Download crash report
            </button>
          </div>
        </div>

        <div style={{ marginTop: 12, display: 'grid', gap: 12 }}>
          <div>
            <div style={{ fontSize: 12, fontWeight: 700, marginBottom: 4 }}>Stack</div>
            <pre style={preStyle}>{report.stack}</pre>
          </div>
          <div>
            <div style={{ fontSize: 12, fontWeight: 700, marginBottom: 4 }}>Component stack</div>
            <pre style={preStyle}>{report.componentStack}</pre>
          </div>
        </div>
      </div>
    );
  }
}
