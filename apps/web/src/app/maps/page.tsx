import { WheelchairMapsClient } from "./WheelchairMapsClient";

export default function MapsPage() {
  return (
    <main>
      <section className="page-hero">
        <div>
          <span className="eyebrow">Routing</span>
          <h1 className="page-title">Wheelchair maps</h1>
          <p className="page-lede">Walking routes around Kathmandu rated for wheelchair access.</p>
        </div>
      </section>

      <WheelchairMapsClient />
    </main>
  );
}
