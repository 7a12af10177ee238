export const locale = {
  appTitle: "Shirtsmith",
  strapline: "Ask for a tee in plain words. We pick out the phrase, letter it and send it to print.",
  nameLabel: "Your name",
  namePlaceholder: "e.g. Sam",
  requestLabel: "What should your shirt say?",
  requestPlaceholder: 'e.g. I want a t-shirt that says "Hello World" in retro red',
  submitRequest: "Make my tee",
  working: "Working…",
  progress: "Progress",
  resultHeading: "Your design",
  viewOrder: "View on the print shop",
  phraseLabel: "Phrase",
  historyHeading: "My designs",
  historyEmpty: "Nothing yet. Your first tee will show up here.",
  refreshHistory: "Refresh",
  statsHeading: "Shop totals",
  statsDesigns: "Designs",
  statsMakers: "Makers",
  statsAverage: "Per maker",
  vendorOnline: "Print shop connected",
  vendorOffline: "Print shop unreachable"
};
