import { ObstacleNavigator } from "@pathsense/modules";

export default function MobilePage() {
  return (
    <main>
      <section className="page-hero">
        <div>
          <span className="eyebrow">Camera mode</span>
          <h1 className="page-title">Obstacle navigator</h1>
          <p className="page-lede">
            Point the back camera ahead. Frames are scored on the device and the estimate is shared
            with the relay server.
          </p>
        </div>
      </section>

      <section>
        <ObstacleNavigator />
      </section>

      <section className="grid detail-grid">
        <div className="card">
          <h2 className="card-title">Alert zones</h2>
          <ul className="list text-sm text-gray-700">
            <li>Critical: closer than 60% of the sensitivity</li>
            <li>Warning: closer than the sensitivity</li>
            <li>Caution: within 150% of the sensitivity</li>
          </ul>
        </div>
        <div className="card">
          <h2 className="card-title">Limits</h2>
          <p className="text-sm text-gray-700">
            Distances are heuristic estimates from edges, texture and contrast. They are not a depth
            sensor.
          </p>
        </div>
      </section>
    </main>
  );
}
