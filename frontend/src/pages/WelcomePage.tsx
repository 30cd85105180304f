// frontend/src/pages/WelcomePage.tsx
import React, { useState } from 'react';
import LoadingButton from '../components/LoadingButton';
import { statementCount, useAssessmentStore } from '../state/assessmentStore';
import type { IntakeForm } from '../types/assessment';

const inputClass = (hasError: boolean) =>
  `w-full rounded-md border px-3 py-2 bg-white shadow-sm text-sm text-text-primary focus:border-primary focus:ring-2 focus:ring-primary/50 ${
    hasError ? 'border-error ring-error/50' : 'border-border'
  }`;

export default function WelcomePage() {
  const [form, setForm] = useState<IntakeForm>({ name: '', email: '', phone: '' });
  const submitIntake = useAssessmentStore((state) => state.submitIntake);
  const isSubmitting = useAssessmentStore((state) => state.isSubmitting);
  const error = useAssessmentStore((state) => state.error);
  const catalog = useAssessmentStore((state) => state.catalog);

  const invalid = new Set(error?.fields ?? []);

  const handleChange = (field: keyof IntakeForm) => (e: React.ChangeEvent<HTMLInputElement>) =>
    setForm((current) => ({ ...current, [field]: e.target.value }));

  const handleSubmit = async (e: React.FormEvent) => {
    e.preventDefault();
    await submitIntake(form);
  };

  return (
    <div className="space-y-6">
      <section className="rounded-lg bg-bg-light border border-border p-6 space-y-3">
        <h2 className="text-xl font-bold text-text-primary">Welcome</h2>
        <p className="text-sm text-text-secondary">
          This self-assessment asks you to rate {catalog ? statementCount(catalog) : 'a series of'} statements about how you
          lead, on a scale from 1 to 10. There are no right or wrong answers; rate how you actually behave today.
        </p>
        <p className="text-sm text-text-secondary">
          The statements appear in a random order. When you finish you will see your profile across the leadership
          dimensions, and your coach will receive a copy to discuss with you.
        </p>
      </section>

      <form className="rounded-lg bg-bg-light border border-border p-6 space-y-4" onSubmit={handleSubmit} noValidate>
        <h3 className="text-base font-semibold text-text-primary">Your details</h3>
        <div>
          <label htmlFor="name" className="block text-sm font-medium text-text-secondary mb-1">
            Full Name *
          </label>
          <input id="name" className={inputClass(invalid.has('name'))} value={form.name} onChange={handleChange('name')} />
        </div>
        <div>
          <label htmlFor="email" className="block text-sm font-medium text-text-secondary mb-1">
            E-mail Address *
          </label>
          <input
            id="email"
            type="email"
            className={inputClass(invalid.has('email'))}
            value={form.email}
            onChange={handleChange('email')}
          />
        </div>
        <div>
          <label htmlFor="phone" className="block text-sm font-medium text-text-secondary mb-1">
            Phone Number
          </label>
          <input id="phone" type="tel" className={inputClass(false)} value={form.phone} onChange={handleChange('phone')} />
        </div>

        {error && <div className="text-sm text-error">{error.message}</div>}

        <LoadingButton type="submit" isLoading={isSubmitting} loadingText="Starting...">
          Start Assessment
        </LoadingButton>
      </form>
    </div>
  );
}
