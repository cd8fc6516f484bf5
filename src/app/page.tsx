import { GalleryApp } from "@/components/gallery-app";

export default function HomePage() {
  return <GalleryApp />;
}
