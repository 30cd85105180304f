// frontend/src/pages/RespondentFlow.tsx
import { useEffect } from 'react';
import { useAssessmentStore } from '../state/assessmentStore';
import WelcomePage from './WelcomePage';
import QuestionnairePage from './QuestionnairePage';
import CompletePage from './CompletePage';

/** Renders the page for the current session state; loading the page opens a fresh session. */
export default function RespondentFlow() {
  const state = useAssessmentStore((s) => s.state);
  const sessionId = useAssessmentStore((s) => s.sessionId);
  const error = useAssessmentStore((s) => s.error);
  const startSession = useAssessmentStore((s) => s.startSession);

  useEffect(() => {
    if (!sessionId) void startSession();
  }, [sessionId, startSession]);

  switch (state) {
    case 'in_progress':
      return <QuestionnairePage />;
    case 'complete':
      return <CompletePage />;
    case 'intake':
      return <WelcomePage />;
    default:
      return (
        <div className="text-sm text-text-secondary">{error ? error.message : 'Loading assessment...'}</div>
      );
  }
}
