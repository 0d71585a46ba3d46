import type { MaterialPreview } from "../hooks/useStudySession.js";

type UploadPanelProps = {
  material: MaterialPreview | null;
  busy: boolean;
  onUpload: (file: File) => Promise<void>;
};

const ACCEPTED_TYPES = "image/jpeg,image/png,application/pdf";

export function UploadPanel({ material, busy, onUpload }: UploadPanelProps): JSX.Element {
  return (
    <section className="upload-panel">
      <h2>Upload your material</h2>
      <input
        type="file"
        accept={ACCEPTED_TYPES}
        disabled={busy}
        aria-label="Upload notes, diagrams, or PDF lectures"
        onChange={(event) => {
          const file = event.target.files?.[0];
          if (file) {
            void onUpload(file);
          }
        }}
      />

      {material ? (
        <figure className="material-preview">
          {material.preview ? (
            <img src={material.preview.dataUrl} alt="First page of the uploaded material" />
          ) : null}
          <figcaption>{material.caption}</figcaption>
        </figure>
      ) : null}
    </section>
  );
}
