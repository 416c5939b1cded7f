import React from 'react';
import FailurePanel from './FailurePanel.js';
import { crashMessage } from '../utils.js';

interface Props {
  /** Name of the view being guarded, shown in the failure message. */
  view: string;
  onReset: () => void;
  children: React.ReactNode;
}

interface State {
  error: Error | null;
}

/** Replaces a crashed tab with a failure panel; switching tabs or retrying clears it. */
export default class ErrorBoundary extends React.Component<Props, State> {
  state: State = { error: null };

  static getDerivedStateFromError(error: Error): State {
    return { error };
  }

  componentDidUpdate(prev: Props) {
    if (prev.view !== this.props.view && this.state.error) {
      this.setState({ error: null });
    }
  }

  private reset = () => {
    this.setState({ error: null });
    this.props.onReset();
  };

  render() {
    const { error } = this.state;
    if (!error) return this.props.children;
    return <FailurePanel error={crashMessage(this.props.view, error)} tips={[]} onRetry={this.reset} />;
  }
}
