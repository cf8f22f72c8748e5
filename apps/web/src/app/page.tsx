import { NavigationConsole } from "@pathsense/modules";

export default function ConsolePage() {
  return (
    <main>
      <section className="page-hero">
        <div>
          <span className="eyebrow">Demo mode</span>
          <h1 className="page-title">Navigation console</h1>
          <p className="page-lede">
            Simulated obstacle readings from the relay server, spoken aloud as they arrive.
          </p>
          <div className="hero-actions">
            <span className="status-pill status-live">Live</span>
            <span className="status-pill status-planning">Simulated</span>
          </div>
        </div>
      </section>

      <section>
        <NavigationConsole />
      </section>
    </main>
  );
}
