// frontend/src/AppRoutes.tsx
import { useEffect } from 'react';
import { createBrowserRouter, RouterProvider, Navigate, Outlet, useSearchParams } from 'react-router-dom';
import MainLayout from './layouts/MainLayout';
import CoachDashboardPage from './pages/CoachDashboardPage';
import RespondentFlow from './pages/RespondentFlow';
import { useCoachStore } from './state/coachStore';

function MainLayoutWrapper() {
  return (
    <MainLayout>
      <Outlet />
    </MainLayout>
  );
}

/**
 * `?coach=<token>` asks for the coach dashboard. It is shown only once the backend
 * accepts the token; any other answer falls back to the respondent flow.
 */
function HomeRoute() {
  const [searchParams] = useSearchParams();
  const coachToken = searchParams.get('coach');
  const access = useCoachStore((state) => state.access);
  const load = useCoachStore((state) => state.load);

  useEffect(() => {
    if (coachToken) void load(coachToken);
  }, [coachToken, load]);

  if (coachToken && (access === 'idle' || access === 'checking')) {
    return <div className="text-sm text-text-secondary">Loading...</div>;
  }
  if (coachToken && access === 'granted') {
    return <CoachDashboardPage />;
  }
  return <RespondentFlow />;
}

const router = createBrowserRouter([
  {
    element: <MainLayoutWrapper />,
    children: [{ path: '/', element: <HomeRoute /> }],
  },
  {
    path: '*',
    element: <Navigate to="/" replace />,
  },
]);

export default function AppRoutes() {
  return <RouterProvider router={router} />;
}
