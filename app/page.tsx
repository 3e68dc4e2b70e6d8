import { AppointmentDashboard } from '@/components/AppointmentDashboard';

export default function Home() {
  return (
    <main className="container mx-auto px-4 py-8 max-w-7xl">
      <h1 className="text-3xl font-bold text-center mb-8">Medical Appointment Dashboard</h1>
      <AppointmentDashboard />
    </main>
  );
}
