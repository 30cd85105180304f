// frontend/src/pages/CoachDashboardPage.tsx
import { useState } from 'react';
import DimensionBreakdown from '../components/DimensionBreakdown';
import LoadingButton from '../components/LoadingButton';
import RadarChart from '../components/RadarChart';
import apiService, { fileNameFromDisposition } from '../services/apiService';
import { assessmentTabLabel, formatAssessmentTime, useCoachStore } from '../state/coachStore';
import { useToastStore } from '../state/toastStore';
import type { StoredAssessment } from '../types/assessment';

export default function CoachDashboardPage() {
  const { token, assessments, selectedId, pendingDeleteId, select, requestDelete, cancelDelete, confirmDelete } =
    useCoachStore();
  const addToast = useToastStore((state) => state.addToast);
  const [activeDimension, setActiveDimension] = useState(0);
  const [isExporting, setIsExporting] = useState(false);
  const [isDeleting, setIsDeleting] = useState(false);

  const selected = assessments.find((a) => a.id === selectedId);

  const handleExport = async (assessment: StoredAssessment) => {
    if (!token) return;
    setIsExporting(true);
    try {
      const response = await apiService.get(`/coach/assessments/${assessment.id}/report`, {
        params: { coach: token },
        responseType: 'blob',
      });

      const url = window.URL.createObjectURL(new Blob([response.data], { type: 'application/pdf' }));
      const link = document.createElement('a');
      link.href = url;
      link.setAttribute(
        'download',
        fileNameFromDisposition(response.headers['content-disposition'], 'assessment.pdf')
      );
      document.body.appendChild(link);
      link.click();
      link.remove();
      window.URL.revokeObjectURL(url);
    } catch (error) {
      console.error(error);
      addToast('Failed to export report.', 'error');
    } finally {
      setIsExporting(false);
    }
  };

  const handleConfirmDelete = async () => {
    setIsDeleting(true);
    const deleted = await confirmDelete();
    setIsDeleting(false);
    setActiveDimension(0);
    addToast(deleted ? 'Assessment deleted successfully!' : 'Could not delete the assessment.', deleted ? 'success' : 'error');
  };

  if (assessments.length === 0) {
    return (
      <div className="rounded-lg bg-bg-light border border-border p-6 text-sm text-text-secondary">
        No assessments have been completed yet.
      </div>
    );
  }

  return (
    <div className="space-y-6">
      <h2 className="text-xl font-bold text-text-primary">Coach Dashboard</h2>

      <nav className="flex flex-wrap gap-2">
        {assessments.map((assessment) => (
          <button
            key={assessment.id}
            onClick={() => {
              select(assessment.id);
              setActiveDimension(0);
            }}
            className={`rounded-md px-3 py-1.5 text-sm font-medium border ${
              assessment.id === selectedId
                ? 'bg-primary text-white border-primary'
                : 'bg-bg-light text-text-secondary border-border hover:bg-bg-medium'
            }`}
          >
            {assessmentTabLabel(assessment)}
          </button>
        ))}
      </nav>

      {selected && (
        <>
          <section className="rounded-lg bg-bg-light border border-border p-6 space-y-4">
            <div className="flex flex-wrap items-start justify-between gap-4">
              <dl className="grid grid-cols-[auto_1fr] gap-x-4 gap-y-1 text-sm">
                <dt className="font-medium text-text-secondary">Name</dt>
                <dd className="text-text-primary">{selected.coachee_name}</dd>
                <dt className="font-medium text-text-secondary">Email</dt>
                <dd className="text-text-primary">{selected.coachee_email}</dd>
                <dt className="font-medium text-text-secondary">Phone</dt>
                <dd className="text-text-primary">{selected.coachee_phone || 'Not provided'}</dd>
                <dt className="font-medium text-text-secondary">Started</dt>
                <dd className="text-text-primary">{formatAssessmentTime(selected.assessment_start)}</dd>
                <dt className="font-medium text-text-secondary">Completed</dt>
                <dd className="text-text-primary">{formatAssessmentTime(selected.completion_time)}</dd>
              </dl>

              <div className="flex gap-2">
                <LoadingButton
                  variant="secondary"
                  isLoading={isExporting}
                  loadingText="Exporting..."
                  onClick={() => void handleExport(selected)}
                >
                  Export PDF
                </LoadingButton>
                {pendingDeleteId === selected.id ? (
                  <>
                    <LoadingButton
                      variant="danger"
                      isLoading={isDeleting}
                      loadingText="Deleting..."
                      onClick={() => void handleConfirmDelete()}
                    >
                      Confirm Delete
                    </LoadingButton>
                    <LoadingButton variant="ghost" onClick={cancelDelete} disabled={isDeleting}>
                      Cancel
                    </LoadingButton>
                  </>
                ) : (
                  <LoadingButton variant="danger" onClick={() => requestDelete(selected.id)}>
                    Delete
                  </LoadingButton>
                )}
              </div>
            </div>
            {pendingDeleteId === selected.id && (
              <p className="text-sm text-error">
                Delete the assessment for {selected.coachee_name}? This cannot be undone.
              </p>
            )}
          </section>

          <section className="rounded-lg bg-bg-light border border-border p-6">
            <RadarChart results={selected.evaluation.results} />
          </section>

          <section className="rounded-lg bg-bg-light border border-border">
            <div className="flex flex-wrap border-b border-border">
              {selected.evaluation.results.map((result, index) => (
                <button
                  key={result.dimensionId}
                  onClick={() => setActiveDimension(index)}
                  className={`px-3 py-2 text-xs font-semibold ${
                    index === activeDimension ? 'text-primary border-b-2 border-primary' : 'text-text-secondary'
                  }`}
                >
                  {result.title}
                </button>
              ))}
            </div>
            <div className="p-6">
              {selected.evaluation.results[activeDimension] && (
                <DimensionBreakdown result={selected.evaluation.results[activeDimension]} />
              )}
            </div>
          </section>
        </>
      )}
    </div>
  );
}
